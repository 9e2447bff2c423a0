import { IsOptional, IsString, Matches } from 'class-validator';
import { PaymentFilterCriteria } from '../interfaces/payment-filter.interface';

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const CALENDAR_DATE_MESSAGE = '$property must be a date in yyyy-MM-dd format';

export class SearchPaymentsDto implements PaymentFilterCriteria {
  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsString()
  driverId?: string;

  @IsOptional()
  @IsString()
  tripId?: string;

  @IsOptional()
  @IsString()
  nachaTitle?: string;

  @IsOptional()
  @IsString()
  account?: string;

  @IsOptional()
  @IsString()
  status?: string;

  @IsOptional()
  @Matches(CALENDAR_DATE_PATTERN, { message: CALENDAR_DATE_MESSAGE })
  startDate?: string;

  @IsOptional()
  @Matches(CALENDAR_DATE_PATTERN, { message: CALENDAR_DATE_MESSAGE })
  endDate?: string;
}

/**
 * Filters available inside the driver portal
 */
export class DriverTripsQueryDto implements Pick<PaymentFilterCriteria, 'tripId' | 'startDate' | 'endDate'> {
  @IsOptional()
  @IsString()
  tripId?: string;

  @IsOptional()
  @Matches(CALENDAR_DATE_PATTERN, { message: CALENDAR_DATE_MESSAGE })
  startDate?: string;

  @IsOptional()
  @Matches(CALENDAR_DATE_PATTERN, { message: CALENDAR_DATE_MESSAGE })
  endDate?: string;
}
