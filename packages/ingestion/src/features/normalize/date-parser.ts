import { ParseError, type DateFormat } from '@posledger/core';
import { err, ok, type Result } from 'neverthrow';

import type { RawValue } from '../../shared/types/raw-table.js';

// Spreadsheet serial day 0 is 1899-12-30 (Lotus leap-year bug included)
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 86_400_000;

const PATTERNS: Record<Exclude<DateFormat, 'auto'>, { order: 'dmy' | 'ymd'; regex: RegExp }> = {
  'DD.MM.YYYY': { order: 'dmy', regex: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/ },
  'DD/MM/YYYY': { order: 'dmy', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/ },
  'YYYY-MM-DD': { order: 'ymd', regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/ },
};

const AUTO_ORDER: Exclude<DateFormat, 'auto'>[] = ['DD.MM.YYYY', 'DD/MM/YYYY', 'YYYY-MM-DD'];

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function toIsoDate(year: number, month: number, day: number): string | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

function matchPattern(text: string, format: Exclude<DateFormat, 'auto'>): string | undefined {
  const { order, regex } = PATTERNS[format];
  const match = regex.exec(text);
  if (!match) return undefined;

  const [first, second, third] = [Number(match[1]), Number(match[2]), Number(match[3])];
  return order === 'dmy' ? toIsoDate(third, second, first) : toIsoDate(first, second, third);
}

export function serialToIsoDate(serial: number): string {
  const date = new Date(SERIAL_EPOCH_MS + Math.floor(serial) * MS_PER_DAY);
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

/**
 * Parse a source date cell to `YYYY-MM-DD`. A time component after the date
 * is ignored; spreadsheet serial numbers are accepted in any format.
 */
export function parseDate(raw: RawValue, format: DateFormat): Result<string, ParseError> {
  if (typeof raw === 'number') {
    if (raw >= 1 && raw < 2_958_466) {
      return ok(serialToIsoDate(raw));
    }
    return err(new ParseError(`Date serial ${raw} out of range`, { value: raw }));
  }
  if (typeof raw !== 'string') {
    return err(new ParseError(`Invalid date "${String(raw)}"`, { value: raw }));
  }

  const text = raw.trim().split(/[\sT]/)[0] ?? '';
  const candidates = format === 'auto' ? AUTO_ORDER : [format];
  for (const candidate of candidates) {
    const iso = matchPattern(text, candidate);
    if (iso) return ok(iso);
  }

  return err(new ParseError(`Invalid date "${raw}" (expected ${format})`, { value: raw }));
}
