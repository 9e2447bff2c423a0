import { MoneyField } from './trip-record.interface';

export type MoneyTotals = Record<MoneyField, number>;

export interface PaymentStatement {
  totals: MoneyTotals;
  grossFare: number;
  netDeposit: number;
  tripCount: number;
}

export interface StatementLine {
  label: string;
  amount: number;
  formatted: string;
  emphasis: 'normal' | 'bold';
  deduction: boolean;
}
