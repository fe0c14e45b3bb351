import { ParseError, getErrorMessage } from '@posledger/core';
import { err, ok, type Result } from 'neverthrow';
import * as XLSX from 'xlsx';

import type { RawRecord, RawTable, RawValue, ReaderOptions } from '../../shared/types/raw-table.js';

function toRawValue(cell: unknown): RawValue {
  if (cell === null || cell === undefined) return null;
  if (typeof cell === 'string' || typeof cell === 'number' || typeof cell === 'boolean') return cell;
  if (cell instanceof Date) return cell.toISOString().slice(0, 10);
  return String(cell);
}

/**
 * Read the first worksheet of an .xlsx/.xls workbook. Numeric cells stay
 * numbers (dates arrive as serial day numbers); the first non-skipped row is
 * the header.
 */
export function readSpreadsheetTable(
  bytes: Buffer,
  file: string,
  options: Pick<ReaderOptions, 'skipRows'>
): Result<RawTable, ParseError> {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { cellDates: false, type: 'buffer' });
  } catch (error) {
    return err(new ParseError(`Unreadable workbook: ${getErrorMessage(error)}`, { file }));
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  const ref = sheet?.['!ref'];
  if (!sheet || !ref) {
    return err(new ParseError('Workbook has no data', { file }));
  }

  const firstRow = XLSX.utils.decode_range(ref).s.r;
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { blankrows: true, defval: null, header: 1, raw: true });

  let headerIndex = options.skipRows;
  while (headerIndex < rows.length && (rows[headerIndex] ?? []).every((cell) => toRawValue(cell) === null || String(cell).trim() === '')) {
    headerIndex++;
  }
  const headerRow = rows[headerIndex];
  if (!headerRow) {
    return err(new ParseError('File has no header row', { file }));
  }

  const header = headerRow.map((cell) => (cell === null || cell === undefined ? '' : String(cell).trim()));
  const records: RawRecord[] = [];

  for (let index = headerIndex + 1; index < rows.length; index++) {
    const row = rows[index] ?? [];
    const cells = row.map(toRawValue);
    if (cells.every((cell) => cell === null || (typeof cell === 'string' && cell.trim() === ''))) continue;

    const values: Record<string, RawValue> = {};
    header.forEach((column, columnIndex) => {
      if (column === '') return;
      const cell = cells[columnIndex] ?? null;
      values[column] = typeof cell === 'string' ? cell.trim() : cell;
    });
    records.push({ line: firstRow + index + 1, values });
  }

  return ok({ file, header: header.filter((column) => column !== ''), records });
}
