export enum PaymentStatus {
  Processed = 'Processed',
  Pending = 'Pending',
  Failed = 'Failed',
  Unknown = 'Unknown'
}
