import { Request } from 'express';
import { DriverTripView, PaymentStatement, StatementLine } from '@payportal/shared';

/**
 * Session-scoped context for one authenticated driver.
 * Handlers receive it explicitly; the record scope is resolved per request.
 */
export interface DriverSession {
  token: string;
  driverNum: string;
  driverName: string;
  createdAt: Date;
}

export interface DriverRequest extends Request {
  driverSession?: DriverSession;
}

export interface DriverTripsResponse {
  driverName: string;
  tripCount: number;
  trips: DriverTripView[];
}

export interface DriverStatementResponse {
  driverName: string;
  statement: PaymentStatement;
  lines: StatementLine[];
}
