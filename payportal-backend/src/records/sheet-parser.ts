import * as XLSX from 'xlsx';
import { RawTripRow } from '@payportal/shared';
import { RecordSourceError } from './record-source.error';

export interface RecordFile {
  name: string;
  contents: Uint8Array;
}

const PLAIN_TEXT_EXTENSION = /\.(csv|txt)$/i;

function isPlainText(file: RecordFile): boolean {
  return PLAIN_TEXT_EXTENSION.test(file.name);
}

function trimHeaders(row: RawTripRow): RawTripRow {
  return Object.fromEntries(Object.entries(row).map(([column, value]) => [column.trim(), value]));
}

/**
 * Reads a CSV or XLSX export into raw rows keyed by the header row.
 *
 * CSV cells are kept as text so identifiers such as bank digits keep their
 * leading zeros; the cleaner does all numeric and date parsing. Workbooks are
 * read with real dates. `sheetName` picks the worksheet of a workbook and is
 * ignored for CSV, which only has one.
 */
export function parseTripSheet(file: RecordFile, sheetName = ''): RawTripRow[] {
  const plainText = isPlainText(file);
  const workbook = plainText
    ? XLSX.read(Buffer.from(file.contents).toString('utf8'), { type: 'string', raw: true })
    : XLSX.read(file.contents, { type: 'array', cellDates: true });

  const targetSheet = plainText || !sheetName ? workbook.SheetNames[0] : sheetName;
  const sheet = targetSheet ? workbook.Sheets[targetSheet] : undefined;
  if (!sheet) {
    throw new RecordSourceError(
      sheetName && !plainText ? `Could not find tab named '${sheetName}'` : `No worksheet found in ${file.name}`,
    );
  }

  return XLSX.utils.sheet_to_json<RawTripRow>(sheet, { defval: '', raw: true }).map(trimHeaders);
}
