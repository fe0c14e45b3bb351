import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { parseDecimal, tryParseDecimal } from '../utils/decimal-utils.js';

// Accepts string, number or Decimal and yields a Decimal. The check is fatal
// so refinements chained after the transform only ever see a Decimal.
export const DecimalSchema = z
  .union([z.string(), z.number(), z.instanceof(Decimal)])
  .superRefine((val, ctx) => {
    if (!(val instanceof Decimal) && (val === '' || !tryParseDecimal(val))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, fatal: true, message: 'Must be a valid decimal number' });
    }
  })
  .transform((val) => (val instanceof Decimal ? val : parseDecimal(val)));

export const DecimalInstanceSchema = z.instanceof(Decimal);

export const NonNegativeDecimalSchema = DecimalInstanceSchema.refine((val) => !val.isNegative(), {
  message: 'Must not be negative',
});

// Calendar date without time zone, e.g. 2024-03-01
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be an ISO date (YYYY-MM-DD)')
  .refine((val) => !Number.isNaN(Date.parse(`${val}T00:00:00Z`)), { message: 'Invalid calendar date' });

export const GroupKeySchema = z.enum(['bank', 'period', 'installment']);

export type GroupKey = z.infer<typeof GroupKeySchema>;

export const PeriodGranularitySchema = z.enum(['day', 'month', 'year']);

export type PeriodGranularity = z.infer<typeof PeriodGranularitySchema>;
