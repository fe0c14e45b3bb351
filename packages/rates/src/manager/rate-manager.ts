import { readFile } from 'node:fs/promises';

import {
  NotFoundError,
  RateImportError,
  ValidationError,
  getErrorMessage,
  tryParseDecimal,
} from '@posledger/core';
import { getLogger, type Logger } from '@posledger/logger';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { parseRateDocument, rateFormatFromPath, serializeRateTable } from '../document/rate-document-codec.js';
import type { RateDocumentFormat } from '../document/rate-document.schemas.js';
import type { RateHistoryLog } from '../history/rate-history-log.js';
import type { RateChange, RateChangeType } from '../history/rate-history.schemas.js';
import type { RateTableStore } from '../store/rate-table-store.js';
import type { RateLookupError, RateTable } from '../table/rate-table.js';

import { compareRateTables, type RateDifference } from './rate-comparison.js';

export type RateImportSource =
  | { kind: 'document'; content: string; format: RateDocumentFormat; label?: string | undefined }
  | { kind: 'file'; path: string }
  | { kind: 'url'; url: string };

export type FetchFn = (url: string) => Promise<Pick<Response, 'headers' | 'ok' | 'status' | 'text'>>;

export interface RateManagerOptions {
  /** Recorded on every history entry */
  actor?: string | undefined;
  clock?: (() => Date) | undefined;
  fetch?: FetchFn | undefined;
}

export interface CommitResult {
  /** Backup taken before the change, if there was anything to back up */
  backup?: string | undefined;
  changes: RateChange[];
  table: RateTable;
}

export type RateUpdateError = ValidationError | NotFoundError | Error;

interface LoadedDocument {
  content: string;
  format: RateDocumentFormat;
  label: string;
}

export function validateRate(value: Decimal.Value): Result<Decimal, ValidationError> {
  const parsed = { value: new Decimal(0) };
  if (value === '' || !tryParseDecimal(value, parsed)) {
    return err(new ValidationError(`Rate ${String(value)} is not a number`, value, 'rate'));
  }
  if (parsed.value.isNegative() || parsed.value.greaterThanOrEqualTo(1)) {
    return err(new ValidationError(`Rate must be at least 0 and below 1, got ${String(value)}`, value, 'rate'));
  }
  return ok(parsed.value);
}

export function validateInstallment(value: number): Result<number, ValidationError> {
  if (!Number.isInteger(value) || value < 1) {
    return err(new ValidationError(`Installment count must be a positive integer, got ${value}`, value, 'installment'));
  }
  return ok(value);
}

/**
 * Owner of the live rate table. Readers get the current immutable snapshot;
 * mutations run one at a time and each one backs up the stored table,
 * saves the new one, appends its changes to the history log and only then
 * swaps the snapshot. Concurrent mutations resolve last-writer-wins in
 * arrival order.
 */
export class RateManager {
  private readonly logger: Logger;
  private readonly actor: string;
  private readonly clock: () => Date;
  private readonly fetchFn: FetchFn;
  private writeQueue: Promise<unknown> = Promise.resolve();

  private constructor(
    private table: RateTable,
    private readonly store: RateTableStore,
    private readonly historyLog: RateHistoryLog,
    options: RateManagerOptions
  ) {
    this.logger = getLogger('RateManager');
    this.actor = options.actor ?? 'system';
    this.clock = options.clock ?? (() => new Date());
    this.fetchFn = options.fetch ?? ((url) => fetch(url));
  }

  static async open(store: RateTableStore, historyLog: RateHistoryLog, options: RateManagerOptions = {}): Promise<Result<RateManager, Error>> {
    const table = await store.load();
    if (table.isErr()) {
      return err(table.error);
    }
    return ok(new RateManager(table.value, store, historyLog, options));
  }

  current(): RateTable {
    return this.table;
  }

  get version(): number {
    return this.table.version;
  }

  lookup(bank: string, installmentCount: number): Result<Decimal, RateLookupError> {
    return this.table.lookup(bank, installmentCount);
  }

  /**
   * Set one expected rate. Out-of-range rates are rejected before anything
   * is queued; the bank must already exist (by id or alias).
   */
  update(bank: string, installmentCount: number, rate: Decimal.Value): Promise<Result<CommitResult, RateUpdateError>> {
    return this.updateMany(bank, new Map([[installmentCount, rate]]), 'update');
  }

  /**
   * Set several installment rates of one bank as a single version.
   */
  updateMany(
    bank: string,
    rates: ReadonlyMap<number, Decimal.Value>,
    changeType: Extract<RateChangeType, 'update' | 'bulk_update'> = 'bulk_update'
  ): Promise<Result<CommitResult, RateUpdateError>> {
    const validated = new Map<number, Decimal>();
    for (const [installment, value] of rates) {
      const count = validateInstallment(installment);
      if (count.isErr()) return Promise.resolve(err(count.error));
      const rate = validateRate(value);
      if (rate.isErr()) {
        this.logger.warn({ bank, installment, value: String(value) }, rate.error.message);
        return Promise.resolve(err(rate.error));
      }
      validated.set(count.value, rate.value);
    }
    if (validated.size === 0) {
      return Promise.resolve(err(new ValidationError('No rates given', [], 'rates')));
    }

    return this.enqueue(async (): Promise<Result<CommitResult, RateUpdateError>> => {
      const target = this.table.resolveBank(bank);
      if (!target) {
        return err(new NotFoundError(`Unknown bank "${bank}"`, { additionalContext: { bank } }));
      }
      const next = this.table.withRates(target.id, validated, this.table.version + 1);
      if (compareRateTables(this.table, next).length === 0) {
        this.logger.info({ bank: target.id }, 'Rates unchanged, nothing to commit');
        return ok({ changes: [], table: this.table });
      }
      return this.commit(next, changeType);
    });
  }

  /**
   * Replace the whole table with a document. The document is fully parsed
   * and validated before anything is touched; an invalid one changes
   * nothing.
   */
  importFrom(source: RateImportSource): Promise<Result<CommitResult, RateImportError | Error>> {
    return this.enqueue(async (): Promise<Result<CommitResult, RateImportError | Error>> => {
      const candidate = await this.loadCandidate(source);
      if (candidate.isErr()) {
        return err(candidate.error);
      }
      return this.commit(candidate.value.table.withVersion(this.table.version + 1), 'import', candidate.value.label);
    });
  }

  /**
   * Differences between the current table and a candidate document. Read-only.
   */
  async compareWith(source: RateImportSource): Promise<Result<RateDifference[], RateImportError>> {
    const candidate = await this.loadCandidate(source);
    if (candidate.isErr()) {
      return err(candidate.error);
    }
    return ok(compareRateTables(this.table, candidate.value.table));
  }

  exportTo(format: RateDocumentFormat): string {
    return serializeRateTable(this.table, format);
  }

  /**
   * The most recent `limit` history records, oldest first.
   */
  async history(limit = 100): Promise<Result<RateChange[], Error>> {
    const all = await this.historyLog.readAll();
    if (all.isErr()) {
      return err(all.error);
    }
    return ok(limit > 0 ? all.value.slice(-limit) : []);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    // The caller sees a rejection through `run`; later mutations still proceed
    this.writeQueue = run.catch((error: unknown) => this.logger.error({ error }, 'Rate mutation rejected'));
    return run;
  }

  private async commit(next: RateTable, changeType: RateChangeType, source?: string): Promise<Result<CommitResult, Error>> {
    const previous = this.table;
    const timestamp = this.clock().toISOString();
    const changes: RateChange[] = compareRateTables(previous, next).map((difference) => ({
      actor: this.actor,
      bank: difference.bank,
      changeType,
      installment: difference.installment,
      newRate: difference.candidate?.toFixed() ?? null,
      oldRate: difference.current?.toFixed() ?? null,
      source,
      timestamp,
      version: next.version,
    }));

    const backup = await this.store.backup();
    if (backup.isErr()) {
      return err(backup.error);
    }

    const saved = await this.store.save(next);
    if (saved.isErr()) {
      return err(saved.error);
    }

    const appended = await this.historyLog.append(changes);
    if (appended.isErr()) {
      // Without its history entry the new table must not stay in place
      const restored = await this.store.save(previous);
      if (restored.isErr()) {
        this.logger.error({ error: restored.error.message }, 'Failed to restore rate table after history failure');
      }
      return err(appended.error);
    }

    this.table = next;
    this.logger.info({ backup: backup.value, changeType, changes: changes.length, version: next.version }, 'Committed rate table');
    return ok({ backup: backup.value, changes, table: next });
  }

  private async loadCandidate(source: RateImportSource): Promise<Result<{ label: string; table: RateTable }, RateImportError>> {
    const document = await this.readSource(source);
    if (document.isErr()) {
      return err(document.error);
    }
    const table = parseRateDocument(document.value.content, document.value.format);
    if (table.isErr()) {
      this.logger.warn({ issues: table.error.issues, source: document.value.label }, 'Rejected rate document');
      return err(table.error);
    }
    return ok({ label: document.value.label, table: table.value });
  }

  private async readSource(source: RateImportSource): Promise<Result<LoadedDocument, RateImportError>> {
    switch (source.kind) {
      case 'document':
        return ok({ content: source.content, format: source.format, label: source.label ?? `${source.format} document` });

      case 'file': {
        const format = rateFormatFromPath(source.path);
        if (!format) {
          return err(new RateImportError(`Cannot tell the format of ${source.path} (expected .yaml, .yml, .json or .csv)`));
        }
        try {
          return ok({ content: await readFile(source.path, 'utf-8'), format, label: source.path });
        } catch (error) {
          return err(new RateImportError(`Failed to read ${source.path}: ${getErrorMessage(error)}`));
        }
      }

      case 'url': {
        try {
          const response = await this.fetchFn(source.url);
          if (!response.ok) {
            return err(new RateImportError(`Failed to fetch ${source.url}: HTTP ${response.status}`));
          }
          const contentType = response.headers.get('content-type') ?? '';
          // YAML parsing accepts JSON bodies too
          const format: RateDocumentFormat = contentType.includes('json') ? 'json' : 'yaml';
          return ok({ content: await response.text(), format, label: source.url });
        } catch (error) {
          return err(new RateImportError(`Failed to fetch ${source.url}: ${getErrorMessage(error)}`));
        }
      }
    }
  }
}
