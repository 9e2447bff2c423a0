import { AccessFailureReason } from '../enums/access-failure-reason.enum';
import {
  AuthenticatedAccess,
  DriverAccessResult,
  UnauthenticatedAccess
} from '../interfaces/driver-access.interface';
import { TripRecord } from '../interfaces/trip-record.interface';

/**
 * Driver Access Gate
 *
 * Two-state gate for the driver self-service view. A driver proves who they
 * are with their driver ID and the last four digits of their bank account;
 * the bank check only gates access and does not narrow the scope.
 */

export const DEFAULT_DRIVER_NAME = 'Driver';

export function unauthenticatedAccess(): UnauthenticatedAccess {
  return { status: 'unauthenticated' };
}

/**
 * All records belonging to one driver number
 */
export function scopeForDriver(records: readonly TripRecord[], driverNum: string): TripRecord[] {
  const target = driverNum.trim();
  return records.filter(record => record.driverNum !== null && record.driverNum.trim() === target);
}

/**
 * Display name taken from the driver's first record
 */
export function driverNameOf(scope: readonly TripRecord[]): string {
  const first = scope[0];
  if (!first) {
    return DEFAULT_DRIVER_NAME;
  }

  const firstName = first.firstName ?? DEFAULT_DRIVER_NAME;
  const lastName = first.lastName ?? '';
  return `${firstName} ${lastName}`.trim();
}

/**
 * Unauthenticated → Authenticated transition.
 *
 * Succeeds when some record carries the driver ID and at least one of that
 * driver's records carries the bank digits. Inputs are compared trimmed.
 */
export function authenticateDriver(
  records: readonly TripRecord[],
  driverIdInput: string,
  bankPinInput: string
): DriverAccessResult {
  const driverNum = driverIdInput.trim();
  const bankPin = bankPinInput.trim();

  const scope = driverNum === '' ? [] : scopeForDriver(records, driverNum);
  if (scope.length === 0) {
    return { ok: false, reason: AccessFailureReason.DriverNotFound };
  }

  const bankMatches = bankPin !== '' && scope.some(record => record.bank !== null && record.bank.trim() === bankPin);
  if (!bankMatches) {
    return { ok: false, reason: AccessFailureReason.IncorrectBankDigits };
  }

  const access: AuthenticatedAccess = {
    status: 'authenticated',
    driverNum,
    driverName: driverNameOf(scope),
    scope
  };
  return { ok: true, access };
}

/**
 * Authenticated → Unauthenticated transition; the scope is dropped
 */
export function logoutDriver(): UnauthenticatedAccess {
  return unauthenticatedAccess();
}
