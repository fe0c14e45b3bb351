import fs from 'node:fs/promises';
import path from 'node:path';

import { ParseError, getErrorMessage, type BankConfig } from '@posledger/core';
import { err, type Result } from 'neverthrow';

import type { RawTable, ReaderOptions } from '../../shared/types/raw-table.js';

import { readCsvTable } from './csv-reader.js';
import { readSpreadsheetTable } from './spreadsheet-reader.js';

export const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xls'] as const;
export const DELIMITED_EXTENSIONS = ['.csv', '.txt'] as const;

export function readerOptionsFor(config: BankConfig): ReaderOptions {
  return { delimiter: config.delimiter, encoding: config.encoding, skipRows: config.skipRows };
}

export type SourceFileKind = 'delimited' | 'spreadsheet';

export function sourceFileKind(filePath: string): SourceFileKind | undefined {
  const extension = path.extname(filePath).toLowerCase();
  if ((SPREADSHEET_EXTENSIONS as readonly string[]).includes(extension)) return 'spreadsheet';
  if ((DELIMITED_EXTENSIONS as readonly string[]).includes(extension)) return 'delimited';
  return undefined;
}

/**
 * Read an already-loaded file into a raw table, choosing the reader by
 * extension.
 */
export function readRawTableFromBytes(bytes: Buffer, filePath: string, options: ReaderOptions): Result<RawTable, ParseError> {
  const kind = sourceFileKind(filePath);
  if (kind === 'spreadsheet') {
    return readSpreadsheetTable(bytes, filePath, options);
  }
  if (kind === 'delimited') {
    return readCsvTable(bytes, filePath, options);
  }
  return err(new ParseError(`Unsupported file type ${path.extname(filePath) || '(none)'}`, { file: filePath }));
}

export async function readRawTable(filePath: string, options: ReaderOptions): Promise<Result<RawTable, ParseError>> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    return err(new ParseError(`Cannot read file: ${getErrorMessage(error)}`, { file: filePath }));
  }
  return readRawTableFromBytes(bytes, filePath, options);
}
