import { MoneyTotals, PaymentStatement } from '../interfaces/payment-statement.interface';
import { MONEY_FIELDS, TripRecord } from '../interfaces/trip-record.interface';

/**
 * Payment Summary Utility
 *
 * Centralizes the statement arithmetic shared by the admin summary and the
 * driver payment statement.
 */

/**
 * Rounds an amount to whole cents
 */
export function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/**
 * Gross fare before commission and cash deductions
 *
 * Gross = Base Fare + Wait Time + Stops + Tolls + Tips
 */
export function grossFareOf(amounts: Pick<TripRecord, 'baseFare' | 'waitTimePay' | 'stopsAmount' | 'tolls' | 'tips'>): number {
  return roundCurrency(
    amounts.baseFare + amounts.waitTimePay + amounts.stopsAmount + amounts.tolls + amounts.tips
  );
}

export function emptyMoneyTotals(): MoneyTotals {
  return {
    totalPaid: 0,
    totalFare: 0,
    coopCommission: 0,
    tips: 0,
    tolls: 0,
    baseFare: 0,
    waitTimePay: 0,
    stopsAmount: 0,
    cashCollected: 0,
    darter: 0
  };
}

/**
 * Sums every monetary column over the given records.
 *
 * The net deposit is the summed total paid: the source amounts are already
 * net of commission and cash collected. An empty input gives an all-zero statement.
 */
export function summarizeTripRecords(records: readonly TripRecord[]): PaymentStatement {
  const totals = emptyMoneyTotals();

  for (const record of records) {
    for (const field of MONEY_FIELDS) {
      totals[field] += record[field];
    }
  }
  for (const field of MONEY_FIELDS) {
    totals[field] = roundCurrency(totals[field]);
  }

  return {
    totals,
    grossFare: grossFareOf(totals),
    netDeposit: totals.totalPaid,
    tripCount: records.length
  };
}
