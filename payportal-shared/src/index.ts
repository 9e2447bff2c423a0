// Enums
export * from './enums/payment-status.enum';
export * from './enums/access-failure-reason.enum';

// Interfaces
export * from './interfaces/trip-record.interface';
export * from './interfaces/payment-filter.interface';
export * from './interfaces/payment-statement.interface';
export * from './interfaces/driver-access.interface';
export * from './interfaces/driver-trip-view.interface';

// DTOs
export * from './dtos/payment-search.dto';
export * from './dtos/driver-login.dto';

// Utils
export * from './utils/record-cleaning.util';
export * from './utils/payment-filter.util';
export * from './utils/payment-summary.util';
export * from './utils/payment-status.util';
export * from './utils/currency-format.util';
export * from './utils/access-gate.util';

// Testing
export * from './testing/mock-trip-record.helper';
