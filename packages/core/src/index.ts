export {
  ConfigurationError,
  DomainError,
  NotFoundError,
  ParseError,
  RateImportError,
  RateUndefinedError,
  SchemaMismatchError,
  UnknownSourceError,
  ValidationError,
  type ErrorContext,
  type ParseErrorLocation,
} from './errors/index.js';

export {
  BankConfigSchema,
  BanksDocumentSchema,
  CanonicalFieldSchema,
  ClassifierRuleSchema,
  ColumnMappingSchema,
  DateFormatSchema,
  FormatVariantSchema,
  NumberFormatSchema,
  RateScaleSchema,
  type BankConfig,
  type BankConfigInput,
  type BanksDocument,
  type CanonicalField,
  type ClassifierRule,
  type ColumnMapping,
  type DateFormat,
  type FormatVariant,
  type NumberFormat,
  type RateScale,
} from './schemas/bank-config.js';

export {
  DecimalInstanceSchema,
  DecimalSchema,
  GroupKeySchema,
  IsoDateSchema,
  NonNegativeDecimalSchema,
  PeriodGranularitySchema,
  type GroupKey,
  type PeriodGranularity,
} from './schemas/primitives.js';

export {
  RateSourceSchema,
  SourceRefSchema,
  TransactionCategorySchema,
  TransactionSchema,
  createTransaction,
  type RateSource,
  type SourceRef,
  type Transaction,
  type TransactionCategory,
  type TransactionInput,
} from './schemas/transaction.js';

export { ZERO, decimalToString, formatDecimal, parseDecimal, sumDecimals, tryParseDecimal } from './utils/decimal-utils.js';
export { containsNormalized, normalizeText } from './utils/text-utils.js';
export { getErrorMessage, hasErrorCode, wrapError } from './utils/type-guard-utils.js';
export { formatZodIssues, fromZod, zodIssueList } from './utils/zod-utils.js';
