import { ZERO } from '@posledger/core';
import type { Decimal } from 'decimal.js';

import type { RateTable } from '../table/rate-table.js';

export type RateDifferenceKind = 'added' | 'removed' | 'changed';

export interface RateDifference {
  bank: string;
  installment: number;
  kind: RateDifferenceKind;
  current?: Decimal | undefined;
  candidate?: Decimal | undefined;
  /** candidate − current, a missing side counting as zero */
  diff: Decimal;
}

/**
 * Entry-level differences from `current` to `candidate`, ordered by bank id
 * and installment count.
 */
export function compareRateTables(current: RateTable, candidate: RateTable): RateDifference[] {
  const differences: RateDifference[] = [];
  const bankIds = [...new Set([...current.bankIds, ...candidate.bankIds])].sort((a, b) => a.localeCompare(b));

  for (const bank of bankIds) {
    const before = current.bank(bank)?.rates ?? new Map<number, Decimal>();
    const after = candidate.bank(bank)?.rates ?? new Map<number, Decimal>();
    const installments = [...new Set([...before.keys(), ...after.keys()])].sort((a, b) => a - b);

    for (const installment of installments) {
      const was = before.get(installment);
      const now = after.get(installment);
      if (was !== undefined && now !== undefined && was.equals(now)) continue;

      differences.push({
        bank,
        candidate: now,
        current: was,
        diff: (now ?? ZERO).minus(was ?? ZERO),
        installment,
        kind: was === undefined ? 'added' : now === undefined ? 'removed' : 'changed',
      });
    }
  }

  return differences;
}
