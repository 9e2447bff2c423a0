import { PaymentFilterCriteria, PaymentFilterOptions } from '../interfaces/payment-filter.interface';
import { CalendarDate, TextField, TripRecord } from '../interfaces/trip-record.interface';
import { parseJobDate } from './record-cleaning.util';

/**
 * Payment Filter Utility
 *
 * Narrows a table of trip records by a conjunction of optional criteria.
 * The input is never modified; every call returns a new array.
 */

export const ALL_FILTER_OPTION = 'All';

type TripPredicate = (record: TripRecord) => boolean;

function searchTerm(value: string | undefined): string | null {
  const term = value?.trim() ?? '';
  return term === '' ? null : term;
}

function exactTerm(value: string | undefined): string | null {
  const term = searchTerm(value);
  return term === null || term === ALL_FILTER_OPTION ? null : term;
}

function containsIgnoreCase(text: string, term: string): boolean {
  return text.toLowerCase().includes(term.toLowerCase());
}

/**
 * Name search goes against "first last" when the record carries both parts,
 * and against every field otherwise.
 */
function matchesName(record: TripRecord, term: string): boolean {
  if (record.firstName !== null && record.lastName !== null) {
    return containsIgnoreCase(`${record.firstName} ${record.lastName}`, term);
  }
  return Object.values(record).some(value => value !== null && containsIgnoreCase(String(value), term));
}

// An identifier column missing from the source skips the filter
function matchesIdentifier(value: string | null, term: string): boolean {
  return value === null || containsIgnoreCase(value, term);
}

// A categorical column missing from the source never matches
function matchesExact(value: string | null, term: string): boolean {
  return value !== null && value === term;
}

function isWithinDateRange(jobDate: CalendarDate | null, startDate: CalendarDate, endDate: CalendarDate): boolean {
  return jobDate !== null && jobDate >= startDate && jobDate <= endDate;
}

function buildPredicates(criteria: PaymentFilterCriteria): TripPredicate[] {
  const predicates: TripPredicate[] = [];

  const name = searchTerm(criteria.name);
  if (name !== null) {
    predicates.push(record => matchesName(record, name));
  }

  const driverId = searchTerm(criteria.driverId);
  if (driverId !== null) {
    predicates.push(record => matchesIdentifier(record.driverNum, driverId));
  }

  const tripId = searchTerm(criteria.tripId);
  if (tripId !== null) {
    predicates.push(record => matchesIdentifier(record.tripId, tripId));
  }

  const exactFilters: Array<[TextField, string | null]> = [
    ['nachaTitle', exactTerm(criteria.nachaTitle)],
    ['account', exactTerm(criteria.account)],
    ['status', exactTerm(criteria.status)]
  ];
  for (const [field, term] of exactFilters) {
    if (term !== null) {
      predicates.push(record => matchesExact(record[field], term));
    }
  }

  // Only filter by date when BOTH bounds are present; a lone bound is ignored
  const startDate = parseJobDate(criteria.startDate);
  const endDate = parseJobDate(criteria.endDate);
  if (startDate !== null && endDate !== null) {
    predicates.push(record => isWithinDateRange(record.jobDate, startDate, endDate));
  }

  return predicates;
}

/**
 * Returns the records matching every supplied criterion.
 * Unset criteria are no-ops, so empty criteria return a copy of the input.
 */
export function filterTripRecords(
  records: readonly TripRecord[],
  criteria: PaymentFilterCriteria = {}
): TripRecord[] {
  const predicates = buildPredicates(criteria);
  return records.filter(record => predicates.every(predicate => predicate(record)));
}

/**
 * Collects the choices for the categorical filters.
 * Each list starts with "All"; a column missing from the source yields only "All".
 */
export function getFilterOptions(records: readonly TripRecord[]): PaymentFilterOptions {
  const distinct = (field: TextField): string[] => {
    const values = new Set<string>();
    for (const record of records) {
      const value = record[field];
      if (value !== null && value !== '') {
        values.add(value);
      }
    }
    return [ALL_FILTER_OPTION, ...Array.from(values).sort()];
  };

  let minJobDate: CalendarDate | null = null;
  let maxJobDate: CalendarDate | null = null;
  for (const { jobDate } of records) {
    if (jobDate === null) continue;
    if (minJobDate === null || jobDate < minJobDate) minJobDate = jobDate;
    if (maxJobDate === null || jobDate > maxJobDate) maxJobDate = jobDate;
  }

  return {
    nachaTitles: distinct('nachaTitle'),
    accounts: distinct('account'),
    statuses: distinct('status'),
    minJobDate,
    maxJobDate
  };
}
