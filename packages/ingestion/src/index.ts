export { parseBanksDocument, loadBankConfigs, BANKS_FILENAME } from './features/config/bank-config-loader.js';
export { classify } from './features/classify/classifier.js';
export { MIN_HEADER_OVERLAP, detectBankByFilename, detectBankByHeader, headerOverlap } from './features/detect/bank-detector.js';
export { mapWithConcurrency } from './features/ingest/concurrency-utils.js';
export { discoverSourceFiles } from './features/ingest/file-discovery.js';
export { IngestionService, type FileReport, type IngestionOptions } from './features/ingest/ingestion-service.js';
export {
  indexHeader,
  mapRow,
  resolveVariant,
  type ColumnBinding,
  type MapperOptions,
  type ResolvedVariant,
} from './features/mapping/schema-mapper.js';
export { parseDate, serialToIsoDate } from './features/normalize/date-parser.js';
export {
  normalizeRate,
  parseAmount,
  parseInstallment,
  parseInteger,
  type InstallmentValue,
} from './features/normalize/number-parser.js';
export {
  BaseSourceAdapter,
  CANCELLED_MARKERS,
  deriveRate,
  type CommissionFigures,
  type InstallmentFigures,
} from './features/process/base-source-adapter.js';
export { GenericSourceAdapter, createSourceAdapter } from './features/process/generic-source-adapter.js';
export { decodeBytes } from './infrastructure/readers/text-decoding.js';
export { parseCsvTable, readCsvTable } from './infrastructure/readers/csv-reader.js';
export { readSpreadsheetTable } from './infrastructure/readers/spreadsheet-reader.js';
export { readRawTable, readRawTableFromBytes, readerOptionsFor, sourceFileKind } from './infrastructure/readers/raw-table-reader.js';
export type { CanonicalRow } from './shared/types/canonical-row.js';
export type { RawRecord, RawRow, RawTable, RawValue, ReaderOptions } from './shared/types/raw-table.js';
export {
  clearSourceAdapters,
  getRegisteredBanks,
  getSourceAdapterRegistration,
  registerSourceAdapter,
  type AdapterError,
  type AdapterOutput,
  type ParseOptions,
  type RowErrorPolicy,
  type SkippedRow,
  type SourceAdapter,
  type SourceAdapterRegistration,
} from './shared/types/source-adapter.js';
export { registerAllBanks } from './sources/banks/index.js';
