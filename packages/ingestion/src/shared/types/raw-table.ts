/**
 * A cell as it comes out of a reader: CSV cells are always strings,
 * spreadsheet cells keep their native number/boolean type.
 */
export type RawValue = string | number | boolean | null;

/** Source column name → cell, keyed by the header exactly as it appears in the file. */
export type RawRow = Record<string, RawValue>;

export interface RawRecord {
  /** 1-based line (CSV) or sheet row (spreadsheet) of the record */
  line: number;
  values: RawRow;
}

export interface RawTable {
  file: string;
  header: string[];
  records: RawRecord[];
}

export interface ReaderOptions {
  delimiter: string;
  encoding: string;
  skipRows: number;
}

export function isBlank(value: RawValue | undefined): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}
