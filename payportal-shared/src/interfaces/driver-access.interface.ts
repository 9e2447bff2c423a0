import { AccessFailureReason } from '../enums/access-failure-reason.enum';
import { TripRecord } from './trip-record.interface';

export interface UnauthenticatedAccess {
  status: 'unauthenticated';
}

export interface AuthenticatedAccess {
  status: 'authenticated';
  driverNum: string;
  driverName: string;
  scope: readonly TripRecord[];
}

export type DriverAccessResult =
  | { ok: true; access: AuthenticatedAccess }
  | { ok: false; reason: AccessFailureReason };
