import path from 'node:path';

import type { CommitResult, RateChange, RateDifference, RateEntry, RateImportSource, RateTable } from '@posledger/rates';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { RatesSourceOptions } from '../shared/schemas.js';
import { renderTable } from '../shared/table-utils.js';

export interface RateEntryRecord {
  bank: string;
  name: string;
  installment: number;
  rate: string;
}

export interface RateDifferenceRecord {
  bank: string;
  installment: number;
  kind: RateDifference['kind'];
  current: string | null;
  candidate: string | null;
  diff: string;
}

export interface CommitRecord {
  version: number;
  backup?: string | undefined;
  changes: RateChange[];
}

/** 0.0336 → "0.0336 (3.36%)" */
export function formatRate(rate: Decimal): string {
  return `${rate.toString()} (${rate.times(100).toString()}%)`;
}

export function rateEntryRecords(table: RateTable): RateEntryRecord[] {
  return table.entries().map((entry: RateEntry) => ({
    bank: entry.bank,
    name: table.bank(entry.bank)?.name ?? entry.bank,
    installment: entry.installment,
    rate: entry.rate.toString(),
  }));
}

export function differenceRecord(difference: RateDifference): RateDifferenceRecord {
  return {
    bank: difference.bank,
    installment: difference.installment,
    kind: difference.kind,
    current: difference.current?.toString() ?? null,
    candidate: difference.candidate?.toString() ?? null,
    diff: difference.diff.toString(),
  };
}

export function commitRecord(result: CommitResult): CommitRecord {
  return { version: result.table.version, backup: result.backup, changes: result.changes };
}

/**
 * `--file` or `--url` to an import source. Relative files resolve against
 * the working directory.
 */
export function sourceFromOptions(options: RatesSourceOptions): Result<RateImportSource, Error> {
  if (options.file) {
    return ok({ kind: 'file', path: path.resolve(options.file) });
  }
  if (options.url) {
    return ok({ kind: 'url', url: options.url });
  }
  return err(new Error('Either --file or --url is required'));
}

export function formatEntries(entries: readonly RateEntryRecord[]): string[] {
  return renderTable(entries, [
    { header: 'BANK', format: (e) => e.bank },
    { header: 'NAME', format: (e) => e.name },
    { align: 'right', header: 'INST', format: (e) => String(e.installment) },
    { align: 'right', header: 'RATE', format: (e) => e.rate },
  ]);
}

export function formatDifferences(differences: readonly RateDifferenceRecord[]): string[] {
  return renderTable(differences, [
    { header: 'BANK', format: (d) => d.bank },
    { align: 'right', header: 'INST', format: (d) => String(d.installment) },
    { header: 'CHANGE', format: (d) => d.kind },
    { align: 'right', header: 'CURRENT', format: (d) => d.current ?? '-' },
    { align: 'right', header: 'NEW', format: (d) => d.candidate ?? '-' },
    { align: 'right', header: 'DIFF', format: (d) => d.diff },
  ]);
}

export function formatHistory(changes: readonly RateChange[]): string[] {
  return renderTable(changes, [
    { header: 'TIME', format: (c) => c.timestamp },
    { align: 'right', header: 'VER', format: (c) => String(c.version) },
    { header: 'TYPE', format: (c) => c.changeType },
    { header: 'ACTOR', format: (c) => c.actor },
    { header: 'BANK', format: (c) => c.bank },
    { align: 'right', header: 'INST', format: (c) => String(c.installment) },
    { align: 'right', header: 'OLD', format: (c) => c.oldRate ?? '-' },
    { align: 'right', header: 'NEW', format: (c) => c.newRate ?? '-' },
    { header: 'SOURCE', format: (c) => c.source ?? '' },
  ]);
}
