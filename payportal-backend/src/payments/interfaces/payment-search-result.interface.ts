import { PaymentStatement, TaggedTripRecord } from '@payportal/shared';

export interface PaymentSearchResult {
  trips: TaggedTripRecord[];
  summary: PaymentStatement;
}
