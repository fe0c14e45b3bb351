import { GroupKeySchema, PeriodGranularitySchema } from '@posledger/core';
import { RateDocumentFormatSchema } from '@posledger/rates';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * `--group-by bank,period` → ['bank', 'period']; an empty string means one
 * overall group.
 */
export const GroupByOptionSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((key) => key.trim())
      .filter((key) => key !== '')
  )
  .pipe(z.array(GroupKeySchema));

export const ReconcileCommandOptionsSchema = JsonFlagSchema.extend({
  groupBy: GroupByOptionSchema.optional(),
  period: PeriodGranularitySchema.optional(),
  output: z.string().min(1).optional(),
  transactions: z.boolean().optional(),
});

export const InstallmentArgumentSchema = z.coerce
  .number({ invalid_type_error: 'Installment count must be a number' })
  .int('Installment count must be a whole number')
  .positive('Installment count must be at least 1');

export const RatesLookupArgsSchema = JsonFlagSchema.extend({
  bank: z.string().min(1, 'Bank is required'),
  installment: InstallmentArgumentSchema,
});

/**
 * Rates stay strings here; range checks belong to the rate manager so the
 * message names the offending value.
 */
export const RatesSetArgsSchema = JsonFlagSchema.extend({
  bank: z.string().min(1, 'Bank is required'),
  rates: z
    .array(z.string())
    .min(1, 'At least one INSTALLMENT=RATE pair is required')
    .transform((pairs, ctx) => {
      const rates = new Map<number, string>();
      for (const pair of pairs) {
        const match = /^(\d+)=(.+)$/.exec(pair.trim());
        if (!match?.[1] || !match[2]) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected INSTALLMENT=RATE, got "${pair}"` });
          return z.NEVER;
        }
        rates.set(Number(match[1]), match[2]);
      }
      return rates;
    }),
  yes: z.boolean().optional(),
});

export const RatesSourceOptionsSchema = JsonFlagSchema.extend({
  file: z.string().min(1).optional(),
  url: z.string().url().optional(),
  yes: z.boolean().optional(),
})
  .refine((data) => !!(data.file || data.url), { message: 'Either --file or --url is required' })
  .refine((data) => !(data.file && data.url), { message: 'Cannot specify both --file and --url' });

export const RatesExportOptionsSchema = JsonFlagSchema.extend({
  format: RateDocumentFormatSchema.default('yaml'),
  output: z.string().min(1).optional(),
});

export const RatesHistoryOptionsSchema = JsonFlagSchema.extend({
  limit: z.coerce.number().int().positive().optional(),
});

export type ReconcileCommandOptions = z.infer<typeof ReconcileCommandOptionsSchema>;
export type RatesLookupArgs = z.infer<typeof RatesLookupArgsSchema>;
export type RatesHistoryOptions = z.infer<typeof RatesHistoryOptionsSchema>;
export type RatesSetArgs = z.infer<typeof RatesSetArgsSchema>;
export type RatesSourceOptions = z.infer<typeof RatesSourceOptionsSchema>;
export type RatesExportOptions = z.infer<typeof RatesExportOptionsSchema>;
