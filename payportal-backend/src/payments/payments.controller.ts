import { Controller, Get, Query } from '@nestjs/common';
import { PaymentFilterOptions, PaymentStatement, SearchPaymentsDto } from '@payportal/shared';
import { PaymentsService } from './payments.service';
import { PaymentSearchResult } from './interfaces/payment-search-result.interface';

@Controller('payments')
export class PaymentsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  /**
   * GET /payments
   * Search trip payments by name, IDs, NACHA file, account, status and date range
   */
  @Get()
  async searchPayments(@Query() query: SearchPaymentsDto): Promise<PaymentSearchResult> {
    return this.paymentsService.searchPayments(query);
  }

  /**
   * GET /payments/summary
   * Financial sub-totals for the same filters
   */
  @Get('summary')
  async getSummary(@Query() query: SearchPaymentsDto): Promise<PaymentStatement> {
    return this.paymentsService.getSummary(query);
  }

  @Get('filter-options')
  async getFilterOptions(): Promise<PaymentFilterOptions> {
    return this.paymentsService.getFilterOptions();
  }
}
