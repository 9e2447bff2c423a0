/**
 * A raw sheet row as exposed by the loader: column name to cell value.
 * Cells may be strings, numbers, booleans or dates depending on the file type.
 */
export type RawTripRow = Record<string, unknown>;

/** Calendar date in `yyyy-MM-dd` form. */
export type CalendarDate = string;

export const MONEY_FIELDS = [
  'totalPaid',
  'totalFare',
  'coopCommission',
  'tips',
  'tolls',
  'baseFare',
  'waitTimePay',
  'stopsAmount',
  'cashCollected',
  'darter'
] as const;

export type MoneyField = typeof MONEY_FIELDS[number];

export const TEXT_FIELDS = [
  'tripId',
  'driverNum',
  'firstName',
  'lastName',
  'status',
  'nachaTitle',
  'account',
  'bank',
  'routing'
] as const;

export type TextField = typeof TEXT_FIELDS[number];

/**
 * One payment event for one driver's completed job.
 *
 * Text fields are `null` only when their column is missing from the source;
 * a blank cell in a present column is the empty string.
 */
export type TripRecord = Record<TextField, string | null> &
  Record<MoneyField, number> & {
    jobDate: CalendarDate | null;
  };

/**
 * Source column name for every record field.
 */
export const TRIP_RECORD_COLUMNS: Record<TextField | MoneyField | 'jobDate', string> = {
  tripId: 'trip_id',
  driverNum: 'driver_num',
  firstName: 'first_name',
  lastName: 'last_name',
  jobDate: 'job_date',
  status: 'status',
  nachaTitle: 'nacha_title',
  account: 'account',
  bank: 'bank',
  routing: 'routing',
  totalPaid: 'total_paid',
  totalFare: 'total_fare',
  coopCommission: 'coop_commission',
  tips: 'tips',
  tolls: 'tolls',
  baseFare: 'base_fare',
  waitTimePay: 'wait_time_pay',
  stopsAmount: 'stops_amount',
  cashCollected: 'cash_collected',
  darter: 'darter'
};
