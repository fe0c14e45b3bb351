import fs from 'node:fs/promises';

import { UnknownSourceError, getErrorMessage, type BankConfig, type Transaction } from '@posledger/core';
import { getLogger } from '@posledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { readRawTableFromBytes, readerOptionsFor } from '../../infrastructure/readers/raw-table-reader.js';
import type { RowErrorPolicy, SkippedRow } from '../../shared/types/source-adapter.js';
import { detectBankByFilename, detectBankByHeader } from '../detect/bank-detector.js';
import { createSourceAdapter } from '../process/generic-source-adapter.js';

import { mapWithConcurrency } from './concurrency-utils.js';
import { discoverSourceFiles } from './file-discovery.js';

export interface IngestionOptions {
  /** Files parsed at the same time */
  concurrency: number;
  rowErrorPolicy: RowErrorPolicy;
}

export interface FileReport {
  bank?: string | undefined;
  /** How the bank was identified */
  detectedBy?: 'filename' | 'header' | undefined;
  error?: Error | undefined;
  file: string;
  filteredCount: number;
  rowCount: number;
  skipped: SkippedRow[];
  status: 'ok' | 'failed';
  transactions: Transaction[];
  variant?: string | undefined;
}

interface Detection {
  config: BankConfig;
  detectedBy: 'filename' | 'header';
}

function failedReport(file: string, error: Error, bank?: string): FileReport {
  return { bank, error, file, filteredCount: 0, rowCount: 0, skipped: [], status: 'failed', transactions: [] };
}

/**
 * Runs every file through detection and its bank's adapter. Each file
 * settles to its own report: a failure in one file never rejects the batch.
 */
export class IngestionService {
  private readonly logger = getLogger('IngestionService');

  constructor(
    private readonly configs: readonly BankConfig[],
    private readonly options: IngestionOptions
  ) {}

  async ingestDirectory(dir: string): Promise<Result<FileReport[], Error>> {
    const files = await discoverSourceFiles(dir);
    if (files.isErr()) {
      return err(files.error);
    }
    this.logger.info({ dir, files: files.value.length }, 'Discovered source files');
    return ok(await this.ingestFiles(files.value));
  }

  async ingestFiles(files: readonly string[]): Promise<FileReport[]> {
    const reports = await mapWithConcurrency(files, this.options.concurrency, (file) => this.ingestFile(file));

    const failed = reports.filter((report) => report.status === 'failed').length;
    this.logger.info({ failed, files: reports.length }, 'Ingestion finished');
    return reports;
  }

  async ingestFile(file: string): Promise<FileReport> {
    try {
      const detection = await this.detect(file);
      if (detection.isErr()) {
        this.logger.warn({ file }, detection.error.message);
        return failedReport(file, detection.error);
      }

      const { config, detectedBy } = detection.value;
      const adapter = createSourceAdapter(config);
      const parsed = await adapter.parseFile(file, { rowErrorPolicy: this.options.rowErrorPolicy });
      if (parsed.isErr()) {
        this.logger.warn({ bank: config.id, code: parsed.error.code, file }, parsed.error.message);
        return { ...failedReport(file, parsed.error, config.id), detectedBy };
      }

      return {
        bank: parsed.value.bank,
        detectedBy,
        file,
        filteredCount: parsed.value.filteredCount,
        rowCount: parsed.value.rowCount,
        skipped: parsed.value.skipped,
        status: 'ok',
        transactions: parsed.value.transactions,
        variant: parsed.value.variant,
      };
    } catch (error) {
      this.logger.error({ error, file }, 'Unexpected failure while ingesting file');
      return failedReport(file, error instanceof Error ? error : new Error(getErrorMessage(error)));
    }
  }

  /**
   * File name first; when no pattern matches, the header row is compared
   * with each bank's required columns (read with that bank's encoding and
   * delimiter).
   */
  private async detect(file: string): Promise<Result<Detection, UnknownSourceError>> {
    const byName = detectBankByFilename(file, this.configs);
    if (byName.isOk()) {
      return ok({ config: byName.value, detectedBy: 'filename' });
    }

    let bytes: Buffer;
    try {
      bytes = await fs.readFile(file);
    } catch (error) {
      this.logger.warn({ error: getErrorMessage(error), file }, 'Cannot read file for header detection');
      return err(byName.error);
    }

    const byHeader = detectBankByHeader(
      file,
      (config) => {
        const table = readRawTableFromBytes(bytes, file, readerOptionsFor(config));
        return table.isOk() ? table.value.header : undefined;
      },
      this.configs
    );
    if (byHeader.isErr()) {
      return err(byHeader.error);
    }

    this.logger.info({ bank: byHeader.value.id, file }, 'Detected bank from header');
    return ok({ config: byHeader.value, detectedBy: 'header' });
  }
}
