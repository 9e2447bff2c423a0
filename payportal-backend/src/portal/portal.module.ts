import { Module } from '@nestjs/common';
import { RecordsModule } from '../records/records.module';
import { PortalController } from './portal.controller';
import { PortalService } from './portal.service';
import { DriverSessionService } from './driver-session.service';
import { DriverSessionGuard } from './guards/driver-session.guard';

@Module({
  imports: [RecordsModule],
  controllers: [PortalController],
  providers: [PortalService, DriverSessionService, DriverSessionGuard],
})
export class PortalModule {}
