import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import {
  ACCESS_FAILURE_MESSAGES,
  AccessFailureReason,
  authenticateDriver,
  buildStatementLines,
  DriverLoginDto,
  DriverLoginResponse,
  filterTripRecords,
  GENERIC_ACCESS_FAILURE_MESSAGE,
  logoutDriver,
  PaymentFilterCriteria,
  scopeForDriver,
  summarizeTripRecords,
  toDriverTripView,
  TripRecord,
  UnauthenticatedAccess,
} from '@payportal/shared';
import { ConfigService } from '../config/config.service';
import { RecordStoreService } from '../records/record-store.service';
import { DriverSessionService } from './driver-session.service';
import {
  DriverSession,
  DriverStatementResponse,
  DriverTripsResponse,
} from './interfaces/driver-session.interface';

export type DriverTripsCriteria = Pick<PaymentFilterCriteria, 'tripId' | 'startDate' | 'endDate'>;

@Injectable()
export class PortalService {
  private readonly logger = new Logger(PortalService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly recordStore: RecordStoreService,
    private readonly driverSessions: DriverSessionService,
  ) {}

  /**
   * Check the driver ID and bank digits against the record table and open a session
   */
  async login(loginDto: DriverLoginDto): Promise<DriverLoginResponse> {
    const records = await this.recordStore.getRecords();
    const result = authenticateDriver(records, loginDto.driverId, loginDto.bankPin);

    if (!result.ok) {
      this.logger.warn(`Driver login rejected: ${result.reason}`);
      throw new UnauthorizedException(this.failureMessage(result.reason));
    }

    const session = this.driverSessions.open(result.access);
    this.logger.log(
      `Driver session opened for ${result.access.scope.length} trip records (${this.driverSessions.openSessionCount} open)`,
    );

    return {
      status: 'authenticated',
      token: session.token,
      driverName: session.driverName,
      tripCount: result.access.scope.length,
    };
  }

  logout(session: DriverSession): UnauthenticatedAccess {
    this.driverSessions.close(session.token);
    return logoutDriver();
  }

  async getTrips(session: DriverSession, criteria: DriverTripsCriteria): Promise<DriverTripsResponse> {
    const trips = await this.findTrips(session, criteria);

    return {
      driverName: session.driverName,
      tripCount: trips.length,
      trips: trips.map(toDriverTripView),
    };
  }

  async getStatement(session: DriverSession, criteria: DriverTripsCriteria): Promise<DriverStatementResponse> {
    const trips = await this.findTrips(session, criteria);
    const statement = summarizeTripRecords(trips);

    return {
      driverName: session.driverName,
      statement,
      lines: buildStatementLines(statement),
    };
  }

  private async findTrips(session: DriverSession, criteria: DriverTripsCriteria): Promise<TripRecord[]> {
    const records = await this.recordStore.getRecords();
    const scope = scopeForDriver(records, session.driverNum);
    return filterTripRecords(scope, {
      tripId: criteria.tripId,
      startDate: criteria.startDate,
      endDate: criteria.endDate,
    });
  }

  private failureMessage(reason: AccessFailureReason): string {
    return this.configService.portalGenericAuthErrors
      ? GENERIC_ACCESS_FAILURE_MESSAGE
      : ACCESS_FAILURE_MESSAGES[reason];
  }
}
