import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  DriverLoginDto,
  DriverLoginResponse,
  DriverTripsQueryDto,
  UnauthenticatedAccess,
} from '@payportal/shared';
import { PortalService } from './portal.service';
import { DriverSessionGuard } from './guards/driver-session.guard';
import { CurrentDriver } from './decorators/current-driver.decorator';
import {
  DriverSession,
  DriverStatementResponse,
  DriverTripsResponse,
} from './interfaces/driver-session.interface';

@Controller('portal')
export class PortalController {
  constructor(private readonly portalService: PortalService) {}

  /**
   * POST /portal/login
   * Driver ID plus the last 4 digits of the bank account
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() loginDto: DriverLoginDto): Promise<DriverLoginResponse> {
    return this.portalService.login(loginDto);
  }

  /**
   * POST /portal/logout
   */
  @Post('logout')
  @UseGuards(DriverSessionGuard)
  @HttpCode(HttpStatus.OK)
  logout(@CurrentDriver() session: DriverSession): UnauthenticatedAccess {
    return this.portalService.logout(session);
  }

  /**
   * GET /portal/trips
   * The driver's own trips, optionally narrowed by trip ID and date range
   */
  @Get('trips')
  @UseGuards(DriverSessionGuard)
  async getTrips(
    @CurrentDriver() session: DriverSession,
    @Query() query: DriverTripsQueryDto,
  ): Promise<DriverTripsResponse> {
    return this.portalService.getTrips(session, query);
  }

  /**
   * GET /portal/statement
   * Payment statement for the same filters
   */
  @Get('statement')
  @UseGuards(DriverSessionGuard)
  async getStatement(
    @CurrentDriver() session: DriverSession,
    @Query() query: DriverTripsQueryDto,
  ): Promise<DriverStatementResponse> {
    return this.portalService.getStatement(session, query);
  }
}
