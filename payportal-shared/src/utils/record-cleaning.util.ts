import { format, getYear, isValid, parse } from 'date-fns';
import {
  CalendarDate,
  MoneyField,
  RawTripRow,
  TextField,
  TRIP_RECORD_COLUMNS,
  TripRecord
} from '../interfaces/trip-record.interface';

/**
 * Record Cleaning Utility
 *
 * Turns raw sheet rows into typed trip records. Cleaning is cell-by-cell:
 * a bad cell falls back to its default and never fails the whole load.
 */

export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/;

// Two-digit years are tried before four-digit ones: 'yyyy' also accepts "25"
const SHEET_DATE_FORMATS = [
  'M/d/yy',
  'M/d/yyyy',
  'yyyy/M/d',
  'MM-dd-yyyy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'd MMM yyyy',
  'd MMMM yyyy'
];

// Plain decimal notation only; Number() alone would also take "0x10" or "0b11"
const DECIMAL_AMOUNT = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

const MIN_JOB_YEAR = 1900;

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parses a currency cell such as `"$1,234.50"` into a number.
 *
 * @returns The numeric amount, or 0 when the cell is blank or unparseable
 */
export function parseCurrency(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== 'string') {
    return 0;
  }

  const cleaned = value.replace(/\$/g, '').replace(/,/g, '').trim();
  if (!DECIMAL_AMOUNT.test(cleaned)) {
    return 0;
  }

  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : 0;
}

/**
 * Parses a job date cell into a calendar date.
 *
 * @returns The date as `yyyy-MM-dd`, or null when the cell cannot be read as a date
 */
export function parseJobDate(value: unknown): CalendarDate | null {
  if (value instanceof Date) {
    return isValid(value) ? format(value, CALENDAR_DATE_FORMAT) : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (text === '') {
    return null;
  }

  const isoMatch = ISO_DATE_PREFIX.exec(text);
  if (isoMatch) {
    const candidate = `${isoMatch[1]}-${isoMatch[2]}-${isoMatch[3]}`;
    return isValid(parse(candidate, CALENDAR_DATE_FORMAT, REFERENCE_DATE)) ? candidate : null;
  }

  for (const dateFormat of SHEET_DATE_FORMATS) {
    const parsed = parse(text, dateFormat, REFERENCE_DATE);
    if (isValid(parsed) && getYear(parsed) >= MIN_JOB_YEAR) {
      return format(parsed, CALENDAR_DATE_FORMAT);
    }
  }

  return null;
}

function hasColumn(row: RawTripRow, column: string): boolean {
  return Object.prototype.hasOwnProperty.call(row, column);
}

function parseTextCell(row: RawTripRow, column: string): string | null {
  if (!hasColumn(row, column)) {
    return null;
  }

  const value = row[column];
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return isValid(value) ? format(value, CALENDAR_DATE_FORMAT) : '';
  }
  return String(value).trim();
}

/**
 * Builds one typed trip record from a raw row.
 * Columns missing from the row become `null` text fields and 0 amounts.
 */
export function cleanTripRecord(row: RawTripRow): TripRecord {
  const text = (field: TextField) => parseTextCell(row, TRIP_RECORD_COLUMNS[field]);
  const money = (field: MoneyField) => parseCurrency(row[TRIP_RECORD_COLUMNS[field]]);

  return {
    tripId: text('tripId'),
    driverNum: text('driverNum'),
    firstName: text('firstName'),
    lastName: text('lastName'),
    jobDate: parseJobDate(row[TRIP_RECORD_COLUMNS.jobDate]),
    status: text('status'),
    nachaTitle: text('nachaTitle'),
    account: text('account'),
    bank: text('bank'),
    routing: text('routing'),
    totalPaid: money('totalPaid'),
    totalFare: money('totalFare'),
    coopCommission: money('coopCommission'),
    tips: money('tips'),
    tolls: money('tolls'),
    baseFare: money('baseFare'),
    waitTimePay: money('waitTimePay'),
    stopsAmount: money('stopsAmount'),
    cashCollected: money('cashCollected'),
    darter: money('darter')
  };
}

export function cleanTripRecords(rows: readonly RawTripRow[]): TripRecord[] {
  return rows.map(cleanTripRecord);
}
