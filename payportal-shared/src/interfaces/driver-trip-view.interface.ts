import { PaymentStatus } from '../enums/payment-status.enum';
import { TripRecord } from './trip-record.interface';

/**
 * Columns a driver never sees in their own trip list
 */
export const DRIVER_HIDDEN_FIELDS = [
  'nachaTitle',
  'bank',
  'routing',
  'account',
  'driverNum',
  'firstName',
  'lastName'
] as const;

export type DriverHiddenField = typeof DRIVER_HIDDEN_FIELDS[number];

export type DriverTripView = Omit<TripRecord, DriverHiddenField> & {
  statusTag: PaymentStatus;
};

export type TaggedTripRecord = TripRecord & {
  statusTag: PaymentStatus;
};
