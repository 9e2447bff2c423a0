import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { RecordStoreService, RecordStoreStatus } from './record-store.service';

@Controller('records')
export class RecordsController {
  constructor(private readonly recordStore: RecordStoreService) {}

  /**
   * GET /records/status
   * Size, age and origin of the cached record table
   */
  @Get('status')
  getStatus(): RecordStoreStatus {
    return this.recordStore.getStatus();
  }

  /**
   * POST /records/refresh
   * Reload the table from the source without waiting for the cache interval
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(): Promise<RecordStoreStatus> {
    await this.recordStore.refresh();
    return this.recordStore.getStatus();
  }
}
