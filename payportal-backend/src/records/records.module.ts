import { Module } from '@nestjs/common';
import { RecordsController } from './records.controller';
import { RecordSourceService } from './record-source.service';
import { RecordStoreService } from './record-store.service';

@Module({
  controllers: [RecordsController],
  providers: [RecordSourceService, RecordStoreService],
  exports: [RecordStoreService],
})
export class RecordsModule {}
