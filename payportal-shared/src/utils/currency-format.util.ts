import { PaymentStatement, StatementLine } from '../interfaces/payment-statement.interface';

const AMOUNT_FORMATTER = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

/**
 * Formats an amount as US dollars, e.g. `$1,234.50`.
 * Deductions are shown in accounting style: `($1,234.50)`.
 */
export function formatCurrency(amount: number, deduction = false): string {
  const digits = `$${AMOUNT_FORMATTER.format(Math.abs(amount))}`;
  if (deduction) {
    return `(${digits})`;
  }
  return amount < 0 ? `-${digits}` : digits;
}

function line(label: string, amount: number, emphasis: StatementLine['emphasis'] = 'normal', deduction = false): StatementLine {
  return { label, amount, formatted: formatCurrency(amount, deduction), emphasis, deduction };
}

/**
 * Lays out a payment statement the way drivers read it:
 * fare components, gross fare, deductions, then the net deposit.
 */
export function buildStatementLines(statement: PaymentStatement): StatementLine[] {
  const { totals } = statement;

  return [
    line('Base Fare', totals.baseFare),
    line('Wait Time Paid', totals.waitTimePay),
    line('Stops Paid', totals.stopsAmount),
    line('Tolls Paid', totals.tolls),
    line('Tips Paid', totals.tips),
    line('Total Gross Fare', statement.grossFare, 'bold'),
    line('Coop Commission', totals.coopCommission, 'normal', true),
    line('Cash Collected', totals.cashCollected, 'normal', true),
    line('NET AMOUNT DEPOSITED', statement.netDeposit, 'bold')
  ];
}
