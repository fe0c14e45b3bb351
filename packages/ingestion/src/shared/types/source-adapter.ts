import type { BankConfig, ParseError, SchemaMismatchError, Transaction } from '@posledger/core';
import type { Result } from 'neverthrow';

import type { RawTable } from './raw-table.js';

/**
 * What to do with a row that fails normalization: record it and carry on,
 * or fail the whole file.
 */
export type RowErrorPolicy = 'skip' | 'abort';

export interface ParseOptions {
  rowErrorPolicy: RowErrorPolicy;
}

export interface SkippedRow {
  column?: string | undefined;
  reason: string;
  row: number;
  value?: string | undefined;
}

export interface AdapterOutput {
  bank: string;
  file: string;
  /** Rows dropped on purpose: cancelled, failed or bank-excluded types */
  filteredCount: number;
  rowCount: number;
  skipped: SkippedRow[];
  transactions: Transaction[];
  variant: string;
}

export type AdapterError = SchemaMismatchError | ParseError;

/**
 * One bank's file → canonical transactions. Implementations share no
 * mutable state, so files can be parsed concurrently.
 */
export interface SourceAdapter {
  readonly bankId: string;
  readonly config: BankConfig;
  parseFile(filePath: string, options: ParseOptions): Promise<Result<AdapterOutput, AdapterError>>;
  parseTable(table: RawTable, options: ParseOptions): Result<AdapterOutput, AdapterError>;
}

export interface SourceAdapterRegistration {
  bankId: string;
  create: (config: BankConfig) => SourceAdapter;
}

const adapters = new Map<string, SourceAdapterRegistration>();

export function registerSourceAdapter(registration: SourceAdapterRegistration): void {
  adapters.set(registration.bankId, registration);
}

export function getSourceAdapterRegistration(bankId: string): SourceAdapterRegistration | undefined {
  return adapters.get(bankId);
}

export function getRegisteredBanks(): string[] {
  return Array.from(adapters.keys()).sort();
}

/**
 * Clear all registered adapters.
 * Used for testing to avoid state leaking between test suites.
 */
export function clearSourceAdapters(): void {
  adapters.clear();
}
