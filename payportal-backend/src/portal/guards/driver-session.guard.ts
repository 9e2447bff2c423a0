import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { DriverSessionService } from '../driver-session.service';
import { DriverRequest } from '../interfaces/driver-session.interface';

/**
 * Driver Session Guard
 * Resolves the bearer token to an open driver session and attaches it to the request
 */
@Injectable()
export class DriverSessionGuard implements CanActivate {
  constructor(private readonly driverSessions: DriverSessionService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<DriverRequest>();
    const authHeader = request.headers.authorization;

    if (!authHeader) {
      throw new UnauthorizedException('Authorization header is missing');
    }

    // Extract token from "Bearer <token>" format
    const token = this.extractTokenFromHeader(authHeader);
    if (!token) {
      throw new UnauthorizedException('Invalid authorization header format');
    }

    const session = this.driverSessions.find(token);
    if (!session) {
      throw new UnauthorizedException('Session has ended. Please log in again.');
    }

    request.driverSession = session;
    return true;
  }

  private extractTokenFromHeader(authHeader: string): string | null {
    const [type, token] = authHeader.split(' ');
    return type === 'Bearer' && token ? token : null;
  }
}
