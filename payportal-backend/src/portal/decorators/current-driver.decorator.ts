import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { DriverRequest, DriverSession } from '../interfaces/driver-session.interface';

/**
 * Current Driver Decorator
 * Extracts the session attached by DriverSessionGuard
 *
 * @example
 * @UseGuards(DriverSessionGuard)
 * async getTrips(@CurrentDriver() session: DriverSession) {
 *   return this.portalService.getTrips(session, {});
 * }
 */
export const CurrentDriver = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): DriverSession => {
    const request = ctx.switchToHttp().getRequest<DriverRequest>();
    if (!request.driverSession) {
      throw new UnauthorizedException('Driver session is missing');
    }
    return request.driverSession;
  },
);
