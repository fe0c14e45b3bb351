import type { Transaction } from '@posledger/core';
import type { Decimal } from 'decimal.js';

/**
 * - `matched`: commission within tolerance of gross × expected rate
 * - `mismatch`: outside tolerance
 * - `rate_undefined`: no expected rate for the bank/installment pair
 * - `skipped`: refunds, never verified
 */
export type VerificationStatus = 'matched' | 'mismatch' | 'rate_undefined' | 'skipped';

export interface VerifiedTransaction extends Transaction {
  readonly verificationStatus: VerificationStatus;
  /** Unset for refunds; false when the rate is undefined */
  readonly rateMatch?: boolean | undefined;
  readonly rateExpected?: Decimal | undefined;
  readonly commissionExpected?: Decimal | undefined;
  /** commission − expected commission */
  readonly commissionDiff?: Decimal | undefined;
  /** actual rate − expected rate */
  readonly rateDiff?: Decimal | undefined;
}
