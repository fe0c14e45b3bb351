import { ZERO, type GroupKey } from '@posledger/core';
import { Decimal } from 'decimal.js';

export interface SummaryKey {
  bank?: string | undefined;
  /** `YYYY`, `YYYY-MM` or `YYYY-MM-DD` depending on granularity */
  period?: string | undefined;
  installment?: number | undefined;
}

/**
 * Totals for one distinct combination of the requested group keys. Keys
 * that were not grouped on are left unset.
 */
export interface Summary extends SummaryKey {
  transactionCount: number;
  matchedCount: number;
  mismatchedCount: number;
  rateUndefinedCount: number;
  totalGross: Decimal;
  totalCommission: Decimal;
  totalNet: Decimal;
  totalBlocked: Decimal;
  /** Over verified transactions only */
  totalCommissionExpected: Decimal;
  totalCommissionDiff: Decimal;
}

export const GROUP_KEY_ORDER: readonly GroupKey[] = ['bank', 'period', 'installment'];

const HUNDRED = new Decimal(100);

export function commissionPercentage(summary: Pick<Summary, 'totalCommission' | 'totalGross'>): Decimal {
  return summary.totalGross.isZero() ? ZERO : summary.totalCommission.dividedBy(summary.totalGross).times(HUNDRED);
}

// Share of all transactions in the group, rate-undefined ones included
export function matchPercentage(summary: Pick<Summary, 'matchedCount' | 'transactionCount'>): Decimal {
  return summary.transactionCount === 0 ? ZERO : new Decimal(summary.matchedCount).dividedBy(summary.transactionCount).times(HUNDRED);
}
