import { z } from 'zod';

export const RateChangeTypeSchema = z.enum(['update', 'bulk_update', 'import']);

export type RateChangeType = z.infer<typeof RateChangeTypeSchema>;

/**
 * One audited rate change. Rates are decimal strings; `null` means the entry
 * did not exist before (or no longer exists after) the change.
 */
export const RateChangeSchema = z.object({
  timestamp: z.string().datetime(),
  version: z.number().int().positive(),
  changeType: RateChangeTypeSchema,
  actor: z.string().min(1),
  bank: z.string().min(1),
  installment: z.number().int().positive(),
  oldRate: z.string().nullable(),
  newRate: z.string().nullable(),
  source: z.string().optional(),
});

export type RateChange = z.infer<typeof RateChangeSchema>;
