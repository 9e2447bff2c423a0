import { IsNotEmpty, IsString } from 'class-validator';

export class DriverLoginDto {
  @IsString()
  @IsNotEmpty()
  driverId!: string;

  @IsString()
  @IsNotEmpty()
  bankPin!: string;
}

export interface DriverLoginResponse {
  status: 'authenticated';
  token: string;
  driverName: string;
  tripCount: number;
}
