import { Injectable } from '@nestjs/common';
import {
  filterTripRecords,
  getFilterOptions,
  PaymentFilterCriteria,
  PaymentFilterOptions,
  PaymentStatement,
  summarizeTripRecords,
  withStatusTag,
} from '@payportal/shared';
import { RecordStoreService } from '../records/record-store.service';
import { PaymentSearchResult } from './interfaces/payment-search-result.interface';

@Injectable()
export class PaymentsService {
  constructor(private readonly recordStore: RecordStoreService) {}

  /**
   * Search all trip records and summarize the matches
   */
  async searchPayments(criteria: PaymentFilterCriteria): Promise<PaymentSearchResult> {
    const records = await this.recordStore.getRecords();
    const trips = filterTripRecords(records, criteria);

    return {
      trips: trips.map(withStatusTag),
      summary: summarizeTripRecords(trips),
    };
  }

  async getSummary(criteria: PaymentFilterCriteria): Promise<PaymentStatement> {
    const records = await this.recordStore.getRecords();
    return summarizeTripRecords(filterTripRecords(records, criteria));
  }

  async getFilterOptions(): Promise<PaymentFilterOptions> {
    const records = await this.recordStore.getRecords();
    return getFilterOptions(records);
  }
}
