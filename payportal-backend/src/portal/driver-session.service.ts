import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AuthenticatedAccess } from '@payportal/shared';
import { ConfigService } from '../config/config.service';
import { DriverSession } from './interfaces/driver-session.interface';

/**
 * Registry of open driver portal sessions, keyed by opaque bearer token.
 * Sessions live in memory only and end on logout or, when
 * PORTAL_SESSION_TTL_MINUTES is set, once they grow older than that.
 */
@Injectable()
export class DriverSessionService {
  private readonly logger = new Logger(DriverSessionService.name);
  private readonly sessions = new Map<string, DriverSession>();

  constructor(private readonly configService: ConfigService) {}

  get openSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Registers a new session. Sessions past their TTL are swept first, so
   * drivers who never log out do not accumulate.
   */
  open(access: AuthenticatedAccess): DriverSession {
    this.sweepExpired();

    const session: DriverSession = {
      token: uuidv4(),
      driverNum: access.driverNum,
      driverName: access.driverName,
      createdAt: new Date(),
    };
    this.sessions.set(session.token, session);
    return session;
  }

  find(token: string): DriverSession | null {
    const session = this.sessions.get(token);
    if (!session) {
      return null;
    }

    if (this.isExpired(session)) {
      this.sessions.delete(token);
      this.logger.log('Driver session expired');
      return null;
    }

    return session;
  }

  close(token: string): boolean {
    return this.sessions.delete(token);
  }

  private sweepExpired(): void {
    let swept = 0;
    for (const [token, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(token);
        swept += 1;
      }
    }
    if (swept > 0) {
      this.logger.log(`Swept ${swept} expired driver sessions`);
    }
  }

  private isExpired(session: DriverSession): boolean {
    const ttlMinutes = this.configService.portalSessionTtlMinutes;
    return ttlMinutes > 0 && Date.now() - session.createdAt.getTime() >= ttlMinutes * 60_000;
  }
}
