import type { Transaction } from '@posledger/core';
import { getLogger, type Logger } from '@posledger/logger';
import type { RateLookupError } from '@posledger/rates';
import { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

import type { VerificationStatus, VerifiedTransaction } from './verified-transaction.js';

/**
 * Source of expected rates. A RateTable snapshot satisfies it.
 */
export interface RateLookup {
  readonly version: number;
  lookup(bank: string, installmentCount: number): Result<Decimal, RateLookupError>;
}

export interface RateVerifierOptions {
  /** Largest accepted |commission − gross × expected rate|, in currency units */
  tolerance: Decimal;
}

export const DEFAULT_TOLERANCE = new Decimal('0.01');

/**
 * Attaches expected-rate verification to transactions. Pure with respect to
 * its inputs: the same transactions against the same table version always
 * verify the same way.
 */
export class RateVerifier {
  private readonly logger: Logger;
  private readonly tolerance: Decimal;

  constructor(
    private readonly rates: RateLookup,
    options: Partial<RateVerifierOptions> = {}
  ) {
    this.logger = getLogger('RateVerifier');
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  }

  verify(transaction: Transaction): VerifiedTransaction {
    if (transaction.category === 'refund') {
      const skipped: VerifiedTransaction = { ...transaction, verificationStatus: 'skipped' };
      return Object.freeze(skipped);
    }

    const expected = this.rates.lookup(transaction.bank, transaction.installmentCount);
    if (expected.isErr()) {
      const undefinedRate: VerifiedTransaction = { ...transaction, rateMatch: false, verificationStatus: 'rate_undefined' };
      return Object.freeze(undefinedRate);
    }

    const rateExpected = expected.value;
    const commissionExpected = transaction.grossAmount.times(rateExpected);
    const commissionDiff = transaction.commissionAmount.minus(commissionExpected);
    const rateMatch = commissionDiff.abs().lessThanOrEqualTo(this.tolerance);

    const verified: VerifiedTransaction = {
      ...transaction,
      commissionDiff,
      commissionExpected,
      rateDiff: transaction.commissionRate.minus(rateExpected),
      rateExpected,
      rateMatch,
      verificationStatus: rateMatch ? 'matched' : 'mismatch',
    };
    return Object.freeze(verified);
  }

  verifyAll(transactions: readonly Transaction[]): VerifiedTransaction[] {
    const verified = transactions.map((transaction) => this.verify(transaction));

    const counts: Record<VerificationStatus, number> = { matched: 0, mismatch: 0, rate_undefined: 0, skipped: 0 };
    for (const transaction of verified) {
      counts[transaction.verificationStatus]++;
    }
    this.logger.info({ ...counts, rateTableVersion: this.rates.version, tolerance: this.tolerance.toFixed() }, 'Verified commission rates');
    if (counts.rate_undefined > 0) {
      const missing = [
        ...new Set(
          verified
            .filter((transaction) => transaction.verificationStatus === 'rate_undefined')
            .map((transaction) => `${transaction.bank}/${transaction.installmentCount}`)
        ),
      ];
      this.logger.warn({ missing }, 'No expected rate for some bank/installment pairs');
    }

    return verified;
  }
}
