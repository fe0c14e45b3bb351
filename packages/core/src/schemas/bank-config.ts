import { z } from 'zod';

export const CanonicalFieldSchema = z.enum([
  'transactionDate',
  'settlementDate',
  'grossAmount',
  'commissionAmount',
  'commissionRate',
  'installmentCount',
  'installmentIndex',
  'cardType',
  'transactionType',
  'description',
  'status',
  'refundFlag',
  'blockedAmount',
  'transactionId',
]);

export type CanonicalField = z.infer<typeof CanonicalFieldSchema>;

/**
 * A source column feeding one canonical field. The field decides how the
 * cell is parsed (amount, rate, date, installment, text). Several mappings
 * may share a target: amounts are summed, other fields take the first
 * non-blank value.
 */
export const ColumnMappingSchema = z.object({
  source: z.string().min(1),
  target: CanonicalFieldSchema,
  required: z.boolean().default(true),
  default: z.string().optional(),
});

export type ColumnMapping = z.infer<typeof ColumnMappingSchema>;

export const FormatVariantSchema = z.object({
  name: z.string().min(1),
  columns: z.array(ColumnMappingSchema).min(1),
});

export type FormatVariant = z.infer<typeof FormatVariantSchema>;

export const ClassifierRuleSchema = z.discriminatedUnion('kind', [
  // A source column whose value translates directly to refund
  z.object({
    kind: z.literal('flag'),
    field: CanonicalFieldSchema,
    refundValues: z.array(z.string().min(1)).min(1),
  }),
  // Case-insensitive refund marker inside a text field
  z.object({
    kind: z.literal('description'),
    fields: z.array(CanonicalFieldSchema).min(1),
    markers: z.array(z.string().min(1)).min(1),
  }),
  // A negative gross amount is a refund
  z.object({
    kind: z.literal('sign'),
  }),
]);

export type ClassifierRule = z.infer<typeof ClassifierRuleSchema>;

export const NumberFormatSchema = z.enum(['signed-fixed', 'tr', 'en', 'auto']);

export type NumberFormat = z.infer<typeof NumberFormatSchema>;

export const DateFormatSchema = z.enum(['DD.MM.YYYY', 'DD/MM/YYYY', 'YYYY-MM-DD', 'auto']);

export type DateFormat = z.infer<typeof DateFormatSchema>;

export const RateScaleSchema = z.enum(['fraction', 'percent', 'auto']);

export type RateScale = z.infer<typeof RateScaleSchema>;

const isValidPattern = (pattern: string): boolean => {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
};

export const BankConfigSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9_]+$/, 'Bank id must be lower-case letters, digits or underscores'),
    displayName: z.string().min(1),
    filePattern: z.string().min(1).refine(isValidPattern, { message: 'filePattern must be a valid regular expression' }),
    encoding: z.string().min(1).default('utf-8'),
    delimiter: z.string().length(1).default(','),
    skipRows: z.number().int().nonnegative().default(0),
    numberFormat: NumberFormatSchema.default('auto'),
    dateFormat: DateFormatSchema.default('auto'),
    rateScale: RateScaleSchema.default('auto'),
    classifier: ClassifierRuleSchema,
    excludedTypes: z.array(z.string().min(1)).default([]),
    columns: z.array(ColumnMappingSchema).min(1).optional(),
    variants: z.array(FormatVariantSchema).min(1).optional(),
  })
  .refine((config) => config.columns !== undefined || config.variants !== undefined, {
    message: 'Either columns or variants must be declared',
    path: ['columns'],
  })
  .transform(({ columns, variants, ...rest }) => ({
    ...rest,
    // A single column list is a one-variant configuration
    variants: variants ?? [{ name: 'default', columns: columns ?? [] }],
  }));

export type BankConfig = z.infer<typeof BankConfigSchema>;

export type BankConfigInput = z.input<typeof BankConfigSchema>;

export const BanksDocumentSchema = z
  .object({
    banks: z.array(BankConfigSchema).min(1),
  })
  .refine((doc) => new Set(doc.banks.map((bank) => bank.id)).size === doc.banks.length, {
    message: 'Bank ids must be unique',
    path: ['banks'],
  });

export type BanksDocument = z.infer<typeof BanksDocumentSchema>;
