import { Decimal } from 'decimal.js';

import type { VerifiedTransaction } from '../verification/verified-transaction.js';

import type { ControlSummary } from './control-summary.js';
import { commissionPercentage, matchPercentage, type Summary } from './summary.js';

const AMOUNT_PLACES = 2;
const RATE_PLACES = 6;

// Fixed-point, never "-0.00"
export function fixed(value: Decimal, places = AMOUNT_PLACES): string {
  const rounded = value.toDecimalPlaces(places, Decimal.ROUND_HALF_UP);
  return (rounded.isZero() ? rounded.abs() : rounded).toFixed(places);
}

export interface SummaryRecord {
  bank?: string | undefined;
  period?: string | undefined;
  installment?: number | undefined;
  transactionCount: number;
  matchedCount: number;
  mismatchedCount: number;
  rateUndefinedCount: number;
  totalGross: string;
  totalCommission: string;
  totalNet: string;
  totalBlocked: string;
  totalCommissionExpected: string;
  totalCommissionDiff: string;
  commissionPercentage: string;
  matchPercentage: string;
}

export function summaryRecord(summary: Summary): SummaryRecord {
  return {
    bank: summary.bank,
    period: summary.period,
    installment: summary.installment,
    transactionCount: summary.transactionCount,
    matchedCount: summary.matchedCount,
    mismatchedCount: summary.mismatchedCount,
    rateUndefinedCount: summary.rateUndefinedCount,
    totalGross: fixed(summary.totalGross),
    totalCommission: fixed(summary.totalCommission),
    totalNet: fixed(summary.totalNet),
    totalBlocked: fixed(summary.totalBlocked),
    totalCommissionExpected: fixed(summary.totalCommissionExpected),
    totalCommissionDiff: fixed(summary.totalCommissionDiff),
    commissionPercentage: fixed(commissionPercentage(summary)),
    matchPercentage: fixed(matchPercentage(summary)),
  };
}

export function controlRecord(control: ControlSummary) {
  return {
    transactionCount: control.transactionCount,
    matchedCount: control.matchedCount,
    mismatchedCount: control.mismatchedCount,
    rateUndefinedCount: control.rateUndefinedCount,
    matchPercentage: fixed(control.matchPercentage),
    totalGross: fixed(control.totalGross),
    totalCommission: fixed(control.totalCommission),
    totalNet: fixed(control.totalNet),
    totalBlocked: fixed(control.totalBlocked),
    totalCommissionExpected: fixed(control.totalCommissionExpected),
    totalCommissionDiff: fixed(control.totalCommissionDiff),
    commissionPercentage: fixed(control.commissionPercentage),
  };
}

/**
 * Drill-down row for one verified transaction. Amounts keep two places,
 * rates six; unset verification fields stay unset.
 */
export function verifiedTransactionRecord(transaction: VerifiedTransaction) {
  const optional = (value: Decimal | undefined, places = AMOUNT_PLACES) => (value === undefined ? undefined : fixed(value, places));
  return {
    bank: transaction.bank,
    transactionDate: transaction.transactionDate,
    settlementDate: transaction.settlementDate,
    category: transaction.category,
    installmentCount: transaction.installmentCount,
    installmentIndex: transaction.installmentIndex,
    grossAmount: fixed(transaction.grossAmount),
    commissionAmount: fixed(transaction.commissionAmount),
    commissionRate: fixed(transaction.commissionRate, RATE_PLACES),
    rateSource: transaction.rateSource,
    netAmount: fixed(transaction.netAmount),
    blockedAmount: optional(transaction.blockedAmount),
    cardType: transaction.cardType,
    transactionType: transaction.transactionType,
    transactionId: transaction.transactionId,
    verificationStatus: transaction.verificationStatus,
    rateMatch: transaction.rateMatch,
    rateExpected: optional(transaction.rateExpected, RATE_PLACES),
    commissionExpected: optional(transaction.commissionExpected),
    commissionDiff: optional(transaction.commissionDiff),
    rateDiff: optional(transaction.rateDiff, RATE_PLACES),
    source: `${transaction.sourceRef.file}:${transaction.sourceRef.row}`,
  };
}

export type VerifiedTransactionRecord = ReturnType<typeof verifiedTransactionRecord>;

/**
 * Stable JSON for a list of summaries: fixed key order, fixed decimal
 * places, two-space indent, trailing newline. Equal input gives equal bytes.
 */
export function serializeSummaries(summaries: readonly Summary[]): string {
  return `${JSON.stringify(summaries.map(summaryRecord), undefined, 2)}\n`;
}
