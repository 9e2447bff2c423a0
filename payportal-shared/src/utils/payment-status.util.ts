import { PaymentStatus } from '../enums/payment-status.enum';
import { DriverTripView, TaggedTripRecord } from '../interfaces/driver-trip-view.interface';
import { TripRecord } from '../interfaces/trip-record.interface';

const KNOWN_STATUSES: readonly PaymentStatus[] = [
  PaymentStatus.Processed,
  PaymentStatus.Pending,
  PaymentStatus.Failed
];

/**
 * Maps a record's raw status cell to a display tag.
 * Anything other than an exact Processed/Pending/Failed is Unknown.
 */
export function paymentStatusOf(record: Pick<TripRecord, 'status'>): PaymentStatus {
  return KNOWN_STATUSES.find(status => status === record.status) ?? PaymentStatus.Unknown;
}

/**
 * Driver-facing copy of a record, without bank and identity columns
 */
export function toDriverTripView(record: TripRecord): DriverTripView {
  const {
    nachaTitle: _nachaTitle,
    bank: _bank,
    routing: _routing,
    account: _account,
    driverNum: _driverNum,
    firstName: _firstName,
    lastName: _lastName,
    ...visible
  } = record;

  return { ...visible, statusTag: paymentStatusOf(record) };
}

/**
 * Full record with its status tag, for the admin trip list
 */
export function withStatusTag(record: TripRecord): TaggedTripRecord {
  return { ...record, statusTag: paymentStatusOf(record) };
}
