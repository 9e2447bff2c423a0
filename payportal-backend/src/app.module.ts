import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { ConfigModule } from './config/config.module';
import { RecordsModule } from './records/records.module';
import { PaymentsModule } from './payments/payments.module';
import { PortalModule } from './portal/portal.module';

@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ConfigModule,
    RecordsModule,
    PaymentsModule,
    PortalModule,
  ],
})
export class AppModule {}
