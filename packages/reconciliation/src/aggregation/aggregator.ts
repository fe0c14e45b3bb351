import { ZERO, type GroupKey, type PeriodGranularity } from '@posledger/core';

import type { VerifiedTransaction } from '../verification/verified-transaction.js';

import { GROUP_KEY_ORDER, type Summary, type SummaryKey } from './summary.js';

export interface AggregateOptions {
  periodGranularity?: PeriodGranularity | undefined;
}

/**
 * Sales only. Refunds (and anything not classified as a sale) never reach
 * the totals.
 */
export function filterSuccessful<T extends Pick<VerifiedTransaction, 'category'>>(transactions: readonly T[]): T[] {
  return transactions.filter((transaction) => transaction.category === 'sale');
}

export function periodOf(isoDate: string, granularity: PeriodGranularity): string {
  switch (granularity) {
    case 'day':
      return isoDate.slice(0, 10);
    case 'month':
      return isoDate.slice(0, 7);
    case 'year':
      return isoDate.slice(0, 4);
  }
}

function keyOf(transaction: VerifiedTransaction, keys: ReadonlySet<GroupKey>, granularity: PeriodGranularity): SummaryKey {
  const key: SummaryKey = {};
  if (keys.has('bank')) key.bank = transaction.bank;
  if (keys.has('period')) key.period = periodOf(transaction.transactionDate, granularity);
  if (keys.has('installment')) key.installment = transaction.installmentCount;
  return key;
}

function emptySummary(key: SummaryKey): Summary {
  return {
    ...key,
    matchedCount: 0,
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

function addTo(summary: Summary, transaction: VerifiedTransaction): void {
  summary.transactionCount++;
  summary.totalGross = summary.totalGross.plus(transaction.grossAmount);
  summary.totalCommission = summary.totalCommission.plus(transaction.commissionAmount);
  summary.totalNet = summary.totalNet.plus(transaction.netAmount);
  summary.totalBlocked = summary.totalBlocked.plus(transaction.blockedAmount ?? ZERO);
  summary.totalCommissionExpected = summary.totalCommissionExpected.plus(transaction.commissionExpected ?? ZERO);
  summary.totalCommissionDiff = summary.totalCommissionDiff.plus(transaction.commissionDiff ?? ZERO);

  switch (transaction.verificationStatus) {
    case 'matched':
      summary.matchedCount++;
      break;
    case 'mismatch':
      summary.mismatchedCount++;
      break;
    case 'rate_undefined':
      summary.rateUndefinedCount++;
      break;
    case 'skipped':
      break;
  }
}

function compareText(a: string | undefined, b: string | undefined): number {
  const left = a ?? '';
  const right = b ?? '';
  return left < right ? -1 : left > right ? 1 : 0;
}

export function compareSummaryKeys(a: SummaryKey, b: SummaryKey): number {
  return compareText(a.bank, b.bank) || compareText(a.period, b.period) || (a.installment ?? 0) - (b.installment ?? 0);
}

/**
 * Group transactions by any subset of bank, period and installment count.
 * One summary per distinct key combination present in the input, ordered
 * by bank, then period, then installment count, whatever the input order.
 * An empty key list yields a single overall summary.
 */
export function aggregate(
  transactions: readonly VerifiedTransaction[],
  groupKeys: readonly GroupKey[],
  options: AggregateOptions = {}
): Summary[] {
  const keys = new Set(GROUP_KEY_ORDER.filter((key) => groupKeys.includes(key)));
  const granularity = options.periodGranularity ?? 'month';
  const groups = new Map<string, Summary>();

  for (const transaction of transactions) {
    const key = keyOf(transaction, keys, granularity);
    const id = JSON.stringify([key.bank, key.period, key.installment]);
    let summary = groups.get(id);
    if (!summary) {
      summary = emptySummary(key);
      groups.set(id, summary);
    }
    addTo(summary, transaction);
  }

  return [...groups.values()].sort(compareSummaryKeys);
}
