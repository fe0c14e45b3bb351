import { ZERO } from '@posledger/core';
import type { Decimal } from 'decimal.js';

import type { VerifiedTransaction } from '../verification/verified-transaction.js';

import { aggregate } from './aggregator.js';
import { commissionPercentage, matchPercentage } from './summary.js';

export interface ControlSummary {
  transactionCount: number;
  matchedCount: number;
  mismatchedCount: number;
  rateUndefinedCount: number;
  matchPercentage: Decimal;
  totalGross: Decimal;
  totalCommission: Decimal;
  totalNet: Decimal;
  totalBlocked: Decimal;
  totalCommissionExpected: Decimal;
  totalCommissionDiff: Decimal;
  commissionPercentage: Decimal;
}

/**
 * Ground totals over a verified stream (normally the successful sales).
 */
export function summarizeControl(transactions: readonly VerifiedTransaction[]): ControlSummary {
  const [overall] = aggregate(transactions, []);
  if (!overall) {
    return {
      commissionPercentage: ZERO,
      matchedCount: 0,
      matchPercentage: ZERO,
      mismatchedCount: 0,
      rateUndefinedCount: 0,
      totalBlocked: ZERO,
      totalCommission: ZERO,
      totalCommissionDiff: ZERO,
      totalCommissionExpected: ZERO,
      totalGross: ZERO,
      totalNet: ZERO,
      transactionCount: 0,
    };
  }

  return {
    commissionPercentage: commissionPercentage(overall),
    matchedCount: overall.matchedCount,
    matchPercentage: matchPercentage(overall),
    mismatchedCount: overall.mismatchedCount,
    rateUndefinedCount: overall.rateUndefinedCount,
    totalBlocked: overall.totalBlocked,
    totalCommission: overall.totalCommission,
    totalCommissionDiff: overall.totalCommissionDiff,
    totalCommissionExpected: overall.totalCommissionExpected,
    totalGross: overall.totalGross,
    totalNet: overall.totalNet,
    transactionCount: overall.transactionCount,
  };
}
