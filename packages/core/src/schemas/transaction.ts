import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ValidationError } from '../errors/index.js';
import { zodIssueList } from '../utils/zod-utils.js';

import { DecimalInstanceSchema, IsoDateSchema, NonNegativeDecimalSchema } from './primitives.js';

export const TransactionCategorySchema = z.enum(['sale', 'refund']);

export type TransactionCategory = z.infer<typeof TransactionCategorySchema>;

/**
 * Where the actual commission rate came from: read from the file, derived as
 * commission / gross, or zero because gross was zero.
 */
export const RateSourceSchema = z.enum(['file', 'calculated', 'zero_gross']);

export type RateSource = z.infer<typeof RateSourceSchema>;

export const SourceRefSchema = z.object({
  file: z.string().min(1),
  row: z.number().int().positive(),
});

export type SourceRef = z.infer<typeof SourceRefSchema>;

export const TransactionSchema = z
  .object({
    bank: z.string().min(1),
    transactionDate: IsoDateSchema,
    settlementDate: IsoDateSchema.optional(),
    grossAmount: NonNegativeDecimalSchema,
    commissionAmount: NonNegativeDecimalSchema,
    commissionRate: NonNegativeDecimalSchema,
    netAmount: DecimalInstanceSchema,
    rateSource: RateSourceSchema,
    installmentCount: z.number().int().positive(),
    installmentIndex: z.number().int().positive(),
    category: TransactionCategorySchema,
    cardType: z.string().optional(),
    transactionType: z.string().optional(),
    transactionId: z.string().optional(),
    blockedAmount: NonNegativeDecimalSchema.optional(),
    sourceRef: SourceRefSchema,
  })
  .refine((tx) => tx.netAmount.equals(tx.grossAmount.minus(tx.commissionAmount)), {
    message: 'netAmount must equal grossAmount - commissionAmount',
    path: ['netAmount'],
  })
  .refine((tx) => tx.installmentIndex <= tx.installmentCount, {
    message: 'installmentIndex must not exceed installmentCount',
    path: ['installmentIndex'],
  });

/**
 * Canonical ledger row. Amounts are non-negative magnitudes; direction is
 * carried by `category`.
 */
export interface Transaction {
  readonly bank: string;
  readonly transactionDate: string;
  readonly settlementDate?: string | undefined;
  readonly grossAmount: Decimal;
  readonly commissionAmount: Decimal;
  readonly commissionRate: Decimal;
  readonly netAmount: Decimal;
  readonly rateSource: RateSource;
  readonly installmentCount: number;
  readonly installmentIndex: number;
  readonly category: TransactionCategory;
  readonly cardType?: string | undefined;
  readonly transactionType?: string | undefined;
  readonly transactionId?: string | undefined;
  readonly blockedAmount?: Decimal | undefined;
  readonly sourceRef: SourceRef;
}

export type TransactionInput = Omit<Transaction, 'netAmount'>;

/**
 * Build a frozen Transaction. The net amount is always computed here and
 * never taken from the source.
 */
export function createTransaction(input: TransactionInput): Result<Transaction, ValidationError> {
  const candidate: Transaction = {
    ...input,
    netAmount: input.grossAmount.minus(input.commissionAmount),
  };

  const parsed = TransactionSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = zodIssueList(parsed.error);
    return err(new ValidationError(`Invalid transaction: ${issues.join('; ')}`, candidate));
  }

  return ok(Object.freeze(candidate));
}
