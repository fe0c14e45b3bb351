import { DecimalSchema } from '@posledger/core';
import { z } from 'zod';

export const RateDocumentFormatSchema = z.enum(['yaml', 'json', 'csv']);

export type RateDocumentFormat = z.infer<typeof RateDocumentFormatSchema>;

export const BankIdSchema = z.string().regex(/^[a-z0-9_]+$/, 'Bank id must be lower-case letters, digits or underscores');

export const InstallmentCountSchema = z.coerce.number().int().positive();

// Expected rates are fractions: 0.0336 means 3.36 %
export const ExpectedRateSchema = DecimalSchema.refine((rate) => rate.greaterThanOrEqualTo(0) && rate.lessThan(1), {
  message: 'Rate must be at least 0 and below 1',
});

// `|` separates aliases in the csv format
export const BankAliasSchema = z.string().min(1).regex(/^[^|]+$/, 'Alias must not contain "|"');

export const BankRatesDocumentSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(BankAliasSchema).default([]),
  rates: z.record(z.string().regex(/^\d+$/, 'Installment count must be a whole number'), ExpectedRateSchema),
});

export type BankRatesDocument = z.infer<typeof BankRatesDocumentSchema>;

/**
 * Persisted rate table: bank id → display name, aliases and installment
 * count → rate. `version` counts committed mutations.
 */
export const RateDocumentSchema = z
  .object({
    version: z.number().int().nonnegative().default(0),
    banks: z.record(BankIdSchema, BankRatesDocumentSchema),
  })
  .superRefine((doc, ctx) => {
    for (const [bankId, bank] of Object.entries(doc.banks)) {
      for (const installment of Object.keys(bank.rates)) {
        if (Number(installment) < 1) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Installment count must be at least 1',
            path: ['banks', bankId, 'rates', installment],
          });
        }
      }
    }
  });

export type RateDocument = z.infer<typeof RateDocumentSchema>;

export type RateDocumentInput = z.input<typeof RateDocumentSchema>;

/**
 * One csv row: `bank_key,bank_name,installment,rate,aliases` with aliases
 * joined by `|`.
 */
export const RateCsvRowSchema = z.object({
  bank_key: BankIdSchema,
  bank_name: z.string().min(1),
  installment: InstallmentCountSchema,
  rate: ExpectedRateSchema,
  aliases: z.string().default(''),
});

export type RateCsvRow = z.infer<typeof RateCsvRowSchema>;
