import { ParseError, getErrorMessage } from '@posledger/core';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import type { RawRecord, RawTable, ReaderOptions } from '../../shared/types/raw-table.js';

import { decodeBytes } from './text-decoding.js';

// Shape returned by csv-parse with `info: true`
const CsvRecordsSchema = z.array(
  z.object({
    info: z.object({ lines: z.number().int() }),
    record: z.array(z.string()),
  })
);

/**
 * Parse delimited text into a raw table. The first record after `skipRows`
 * lines is the header; fully blank records are dropped.
 */
export function parseCsvTable(content: string, file: string, options: Omit<ReaderOptions, 'encoding'>): Result<RawTable, ParseError> {
  let parsed: unknown;
  try {
    parsed = parse(content.replace(/^\uFEFF/, ''), {
      delimiter: options.delimiter,
      from_line: options.skipRows + 1,
      info: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    return err(new ParseError(`Malformed CSV: ${getErrorMessage(error)}`, { file }));
  }

  const records = CsvRecordsSchema.safeParse(parsed);
  if (!records.success) {
    return err(new ParseError('Unexpected CSV parser output', { file }));
  }

  const [headerRecord, ...body] = records.data;
  if (!headerRecord) {
    return err(new ParseError('File has no header row', { file }));
  }

  const header = headerRecord.record.map((name) => name.trim());
  const rows: RawRecord[] = [];
  for (const { info, record } of body) {
    if (record.every((cell) => cell === '')) continue;

    const values: Record<string, string> = {};
    header.forEach((column, index) => {
      if (column === '') return;
      values[column] = record[index] ?? '';
    });
    // `lines` counts the file lines consumed so far, i.e. the record's own line
    rows.push({ line: info.lines, values });
  }

  return ok({ file, header: header.filter((column) => column !== ''), records: rows });
}

export function readCsvTable(bytes: Uint8Array, file: string, options: ReaderOptions): Result<RawTable, ParseError> {
  const { text } = decodeBytes(bytes, options.encoding, file);
  return parseCsvTable(text, file, options);
}
