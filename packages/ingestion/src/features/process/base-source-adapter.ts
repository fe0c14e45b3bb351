import {
  ParseError,
  containsNormalized,
  createTransaction,
  type BankConfig,
  type RateSource,
  type Transaction,
  type TransactionCategory,
} from '@posledger/core';
import { getLogger, type Logger } from '@posledger/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { CanonicalRow } from '../../shared/types/canonical-row.js';
import type { RawRecord, RawRow, RawTable } from '../../shared/types/raw-table.js';
import type {
  AdapterError,
  AdapterOutput,
  ParseOptions,
  SkippedRow,
  SourceAdapter,
} from '../../shared/types/source-adapter.js';
import { readRawTable, readerOptionsFor } from '../../infrastructure/readers/raw-table-reader.js';
import { classify } from '../classify/classifier.js';
import { mapRow, resolveVariant, type ColumnBinding } from '../mapping/schema-mapper.js';
import { normalizeRate } from '../normalize/number-parser.js';

// Cancelled or failed authorisations never settle
export const CANCELLED_MARKERS = ['iptal', 'basarisiz', 'cancelled', 'failed'] as const;

export interface CommissionFigures {
  commissionAmount: Decimal;
  commissionRate: Decimal;
  rateSource: RateSource;
}

export interface InstallmentFigures {
  count: number;
  index: number;
}

type RowOutcome = { kind: 'filtered'; reason: string } | { kind: 'transaction'; transaction: Transaction };

/**
 * Shared parse pipeline for every bank: resolve the column layout, then per
 * row map → adjust → filter → classify → build. Banks override the
 * protected hooks for their quirks instead of branching here.
 */
export abstract class BaseSourceAdapter implements SourceAdapter {
  protected readonly logger: Logger;

  constructor(public readonly config: BankConfig) {
    this.logger = getLogger(`${config.id}Adapter`);
  }

  get bankId(): string {
    return this.config.id;
  }

  async parseFile(filePath: string, options: ParseOptions): Promise<Result<AdapterOutput, AdapterError>> {
    const table = await readRawTable(filePath, readerOptionsFor(this.config));
    if (table.isErr()) {
      return err(table.error);
    }
    return this.parseTable(table.value, options);
  }

  parseTable(table: RawTable, options: ParseOptions): Result<AdapterOutput, AdapterError> {
    const variant = resolveVariant(table.header, this.config, table.file);
    if (variant.isErr()) {
      this.logger.warn({ file: table.file, missing: variant.error.missingColumns }, 'No column layout matched');
      return err(variant.error);
    }

    const transactions: Transaction[] = [];
    const skipped: SkippedRow[] = [];
    let filteredCount = 0;

    for (const record of table.records) {
      const outcome = this.transformRecord(record, variant.value.bindings, table.file);

      if (outcome.isErr()) {
        const error = outcome.error.at({ file: table.file, row: record.line });
        if (options.rowErrorPolicy === 'abort') {
          this.logger.error({ column: error.column, file: table.file, row: record.line }, `Aborting file: ${error.message}`);
          return err(error);
        }
        skipped.push({
          column: error.column,
          reason: error.message,
          row: record.line,
          value: error.value === undefined || error.value === null ? undefined : String(error.value),
        });
        this.logger.warn({ column: error.column, file: table.file, row: record.line }, `Skipped row: ${error.message}`);
        continue;
      }

      if (outcome.value.kind === 'filtered') {
        filteredCount++;
        this.logger.debug({ file: table.file, reason: outcome.value.reason, row: record.line }, 'Filtered row');
        continue;
      }

      transactions.push(outcome.value.transaction);
    }

    this.logger.info(
      {
        file: table.file,
        filtered: filteredCount,
        skipped: skipped.length,
        transactions: transactions.length,
        variant: variant.value.name,
      },
      'Parsed file'
    );

    return ok({
      bank: this.bankId,
      file: table.file,
      filteredCount,
      rowCount: table.records.length,
      skipped,
      transactions,
      variant: variant.value.name,
    });
  }

  private transformRecord(record: RawRecord, bindings: readonly ColumnBinding[], file: string): Result<RowOutcome, ParseError> {
    const mapped = mapRow(record.values, bindings, {
      dateFormat: this.config.dateFormat,
      numberFormat: this.config.numberFormat,
    });
    if (mapped.isErr()) {
      return err(mapped.error);
    }

    const row = this.adjustRow(mapped.value, record.values);

    const exclusion = this.exclusionReason(row);
    if (exclusion !== undefined) {
      return ok({ kind: 'filtered', reason: exclusion });
    }

    const category = this.classifyRow(row);

    if (row.transactionDate === undefined) {
      return err(new ParseError('Missing required field transactionDate', { column: 'transactionDate' }));
    }
    if (row.grossAmount === undefined) {
      return err(new ParseError('Missing required field grossAmount', { column: 'grossAmount' }));
    }

    const commission = this.resolveCommission(row, row.grossAmount.abs());
    if (commission.isErr()) {
      return err(commission.error);
    }

    const installment = this.resolveInstallment(row);

    const created = createTransaction({
      bank: this.bankId,
      blockedAmount: row.blockedAmount?.abs(),
      cardType: row.cardType,
      category,
      commissionAmount: commission.value.commissionAmount,
      commissionRate: commission.value.commissionRate,
      grossAmount: row.grossAmount.abs(),
      installmentCount: installment.count,
      installmentIndex: installment.index,
      rateSource: commission.value.rateSource,
      settlementDate: row.settlementDate,
      sourceRef: { file, row: record.line },
      transactionDate: row.transactionDate,
      transactionId: row.transactionId,
      transactionType: row.transactionType,
    });
    if (created.isErr()) {
      return err(new ParseError(created.error.message));
    }

    return ok({ kind: 'transaction', transaction: created.value });
  }

  /**
   * Bank-specific touch-ups on a mapped row (code translation, derived
   * fields). The raw row is available for columns outside the mapping.
   */
  protected adjustRow(row: CanonicalRow, _raw: RawRow): CanonicalRow {
    return row;
  }

  protected classifyRow(row: CanonicalRow): TransactionCategory {
    return classify(row, this.config.classifier);
  }

  /**
   * Marker that removes the row from the stream, if any. Checked against the
   * transaction type and status.
   */
  protected exclusionReason(row: CanonicalRow): string | undefined {
    const labels = [row.transactionType, row.status].filter((label): label is string => label !== undefined);
    if (labels.length === 0) return undefined;

    return [...this.config.excludedTypes, ...CANCELLED_MARKERS].find((marker) =>
      labels.some((label) => containsNormalized(label, marker))
    );
  }

  /**
   * Commission and the actual rate. A rate column wins (normalized to a
   * fraction); otherwise the rate is derived from commission / gross.
   */
  protected resolveCommission(row: CanonicalRow, gross: Decimal): Result<CommissionFigures, ParseError> {
    const fileRate = row.commissionRate === undefined ? undefined : normalizeRate(row.commissionRate, this.config.rateScale);

    if (row.commissionAmount === undefined) {
      if (fileRate === undefined) {
        return err(new ParseError('Missing required field commissionAmount', { column: 'commissionAmount' }));
      }
      return ok({
        commissionAmount: gross.times(fileRate).toDecimalPlaces(2),
        commissionRate: fileRate,
        rateSource: 'file',
      });
    }

    const commissionAmount = row.commissionAmount.abs();
    if (fileRate !== undefined) {
      return ok({ commissionAmount, commissionRate: fileRate, rateSource: 'file' });
    }
    return ok(deriveRate(commissionAmount, gross));
  }

  /**
   * Missing or zero counts mean a single payment; the index defaults to 1.
   */
  protected resolveInstallment(row: CanonicalRow): InstallmentFigures {
    const count = Math.max(row.installmentCount ?? 1, 1);
    const index = Math.min(Math.max(row.installmentIndex ?? 1, 1), count);
    return { count, index };
  }
}

export function deriveRate(commissionAmount: Decimal, gross: Decimal): CommissionFigures {
  if (gross.isZero()) {
    return { commissionAmount, commissionRate: gross, rateSource: 'zero_gross' };
  }
  return {
    commissionAmount,
    commissionRate: commissionAmount.dividedBy(gross).toDecimalPlaces(6),
    rateSource: 'calculated',
  };
}
