// Pure helpers for the reconcile command: parameter building and rendering.

import path from 'node:path';

import { DomainError, type GroupKey, type PeriodGranularity } from '@posledger/core';
import type { Settings } from '@posledger/env';
import type { FileReport } from '@posledger/ingestion';
import {
  controlRecord,
  reconciliationOptionsFromSettings,
  summaryRecord,
  verifiedTransactionRecord,
  type ReconciliationResult,
  type SummaryRecord,
  type VerifiedTransactionRecord,
} from '@posledger/reconciliation';
import type { Decimal } from 'decimal.js';

import type { ReconcileCommandOptions } from '../shared/schemas.js';
import { renderTable } from '../shared/table-utils.js';

export interface ReconcileHandlerParams {
  dir: string;
  groupBy: readonly GroupKey[];
  periodGranularity: PeriodGranularity;
  tolerance: Decimal;
}

export interface FileReportRecord {
  file: string;
  bank?: string | undefined;
  status: FileReport['status'];
  rowCount: number;
  transactionCount: number;
  filteredCount: number;
  skippedCount: number;
  error?: { code: string; message: string } | undefined;
}

export interface ReconcileReport {
  rateTableVersion: number;
  files: FileReportRecord[];
  summaries: SummaryRecord[];
  control: ReturnType<typeof controlRecord>;
  transactions?: VerifiedTransactionRecord[] | undefined;
}

/**
 * Flags win over settings.yaml; the directory defaults to the data directory.
 */
export function buildReconcileParams(
  dir: string | undefined,
  options: ReconcileCommandOptions,
  settings: Settings,
  dataDir: string
): ReconcileHandlerParams {
  const defaults = reconciliationOptionsFromSettings(settings);
  return {
    dir: path.resolve(dir ?? dataDir),
    groupBy: options.groupBy ?? defaults.groupBy,
    periodGranularity: options.period ?? defaults.periodGranularity,
    tolerance: defaults.tolerance,
  };
}

export function fileReportRecord(report: FileReport): FileReportRecord {
  return {
    file: report.file,
    bank: report.bank,
    status: report.status,
    rowCount: report.rowCount,
    transactionCount: report.transactions.length,
    filteredCount: report.filteredCount,
    skippedCount: report.skipped.length,
    error: report.error
      ? { code: report.error instanceof DomainError ? report.error.code : 'ERROR', message: report.error.message }
      : undefined,
  };
}

export function buildReconcileReport(result: ReconciliationResult, includeTransactions = false): ReconcileReport {
  return {
    rateTableVersion: result.rateTableVersion,
    files: result.files.map(fileReportRecord),
    summaries: result.summaries.map(summaryRecord),
    control: controlRecord(result.control),
    transactions: includeTransactions ? result.verified.map(verifiedTransactionRecord) : undefined,
  };
}

export function hasFailedFiles(result: ReconciliationResult): boolean {
  return result.files.some((report) => report.status === 'failed');
}

/**
 * One line per file, paths relative to the reconciled directory.
 */
export function formatFileReports(files: readonly FileReportRecord[], baseDir: string): string[] {
  return files.map((file) => {
    const name = path.relative(baseDir, file.file) || file.file;
    if (file.status === 'failed') {
      return `✗ ${name}: ${file.error?.code ?? 'ERROR'} ${file.error?.message ?? ''}`.trimEnd();
    }
    const extras = [
      file.filteredCount > 0 ? `${file.filteredCount} filtered` : undefined,
      file.skippedCount > 0 ? `${file.skippedCount} skipped` : undefined,
    ].filter((part) => part !== undefined);
    const suffix = extras.length > 0 ? ` (${extras.join(', ')})` : '';
    return `✓ ${name} [${file.bank ?? '?'}]: ${file.transactionCount} transactions${suffix}`;
  });
}

export function formatSummaryTable(summaries: readonly SummaryRecord[]): string[] {
  return renderTable(summaries, [
    { header: 'BANK', format: (s) => s.bank ?? '*' },
    { header: 'PERIOD', format: (s) => s.period ?? '*' },
    { align: 'right', header: 'INST', format: (s) => (s.installment === undefined ? '*' : String(s.installment)) },
    { align: 'right', header: 'TXNS', format: (s) => String(s.transactionCount) },
    { align: 'right', header: 'GROSS', format: (s) => s.totalGross },
    { align: 'right', header: 'COMMISSION', format: (s) => s.totalCommission },
    { align: 'right', header: 'NET', format: (s) => s.totalNet },
    { align: 'right', header: 'RATE %', format: (s) => s.commissionPercentage },
    { align: 'right', header: 'MISMATCH', format: (s) => String(s.mismatchedCount) },
    { align: 'right', header: 'UNDEFINED', format: (s) => String(s.rateUndefinedCount) },
    { align: 'right', header: 'MATCH %', format: (s) => s.matchPercentage },
  ]);
}

export function formatControl(control: ReconcileReport['control']): string {
  return [
    `Transactions: ${control.transactionCount} (${control.matchedCount} matched, ${control.mismatchedCount} mismatched, ${control.rateUndefinedCount} without rate)`,
    `Match rate:   ${control.matchPercentage}%`,
    `Gross:        ${control.totalGross}`,
    `Commission:   ${control.totalCommission} (expected ${control.totalCommissionExpected}, diff ${control.totalCommissionDiff})`,
    `Net:          ${control.totalNet}`,
  ].join('\n');
}
