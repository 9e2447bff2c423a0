import { CalendarDate } from './trip-record.interface';

/**
 * Independently optional search criteria, combined with AND.
 * Blank strings and `"All"` on the categorical fields mean "no filter".
 */
export interface PaymentFilterCriteria {
  name?: string;
  driverId?: string;
  tripId?: string;
  nachaTitle?: string;
  account?: string;
  status?: string;
  // The date range only applies when both bounds are given
  startDate?: CalendarDate;
  endDate?: CalendarDate;
}

export interface PaymentFilterOptions {
  nachaTitles: string[];
  accounts: string[];
  statuses: string[];
  minJobDate: CalendarDate | null;
  maxJobDate: CalendarDate | null;
}
