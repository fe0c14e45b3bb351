import {
  ParseError,
  SchemaMismatchError,
  normalizeText,
  type BankConfig,
  type ColumnMapping,
  type DateFormat,
  type NumberFormat,
} from '@posledger/core';
import { err, ok, type Result } from 'neverthrow';

import { isAmountField, isDateField, type CanonicalRow } from '../../shared/types/canonical-row.js';
import { isBlank, type RawRow, type RawValue } from '../../shared/types/raw-table.js';
import { parseDate } from '../normalize/date-parser.js';
import { parseAmount, parseInstallment, parseInteger } from '../normalize/number-parser.js';

/**
 * A mapping paired with the header column that satisfies it, if any.
 */
export interface ColumnBinding {
  column: string | undefined;
  mapping: ColumnMapping;
}

export interface ResolvedVariant {
  bindings: ColumnBinding[];
  name: string;
}

export interface MapperOptions {
  dateFormat: DateFormat;
  numberFormat: NumberFormat;
}

export function indexHeader(header: readonly string[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const column of header) {
    const key = normalizeText(column);
    if (key !== '' && !index.has(key)) {
      index.set(key, column);
    }
  }
  return index;
}

/**
 * Pick the first variant whose required source columns all appear in the
 * header. Header matching ignores case, Turkish diacritics and separators.
 */
export function resolveVariant(
  header: readonly string[],
  config: BankConfig,
  file: string
): Result<ResolvedVariant, SchemaMismatchError> {
  const headerIndex = indexHeader(header);
  const missingByVariant: Record<string, string[]> = {};

  for (const variant of config.variants) {
    const missing = variant.columns
      .filter((mapping) => mapping.required && !headerIndex.has(normalizeText(mapping.source)))
      .map((mapping) => mapping.source);

    if (missing.length === 0) {
      return ok({
        bindings: variant.columns.map((mapping) => ({
          column: headerIndex.get(normalizeText(mapping.source)),
          mapping,
        })),
        name: variant.name,
      });
    }
    missingByVariant[variant.name] = missing;
  }

  return err(new SchemaMismatchError(file, config.id, missingByVariant));
}

function cellFor(raw: RawRow, binding: ColumnBinding): RawValue | undefined {
  const value = binding.column === undefined ? undefined : raw[binding.column];
  if (isBlank(value)) {
    return binding.mapping.default;
  }
  return value;
}

function located(error: ParseError, binding: ColumnBinding): ParseError {
  return error.at({ column: binding.column ?? binding.mapping.source });
}

/**
 * Raw row → canonical row. Pure: unmapped columns are dropped, blank cells
 * without a default leave their field unset, and the first unparseable cell
 * fails the row with a ParseError naming its column.
 */
export function mapRow(raw: RawRow, bindings: readonly ColumnBinding[], options: MapperOptions): Result<CanonicalRow, ParseError> {
  const row: CanonicalRow = {};

  for (const binding of bindings) {
    const value = cellFor(raw, binding);
    if (value === undefined) continue;

    const target = binding.mapping.target;

    if (isAmountField(target)) {
      const parsed = parseAmount(value, options.numberFormat);
      if (parsed.isErr()) return err(located(parsed.error, binding));
      // Several columns feeding one amount are summed
      const previous = row[target];
      row[target] = previous ? previous.plus(parsed.value) : parsed.value;
      continue;
    }

    if (row[target] !== undefined) continue;

    if (isDateField(target)) {
      const parsed = parseDate(value, options.dateFormat);
      if (parsed.isErr()) return err(located(parsed.error, binding));
      row[target] = parsed.value;
    } else if (target === 'commissionRate') {
      const parsed = parseAmount(value, options.numberFormat);
      if (parsed.isErr()) return err(located(parsed.error, binding));
      row.commissionRate = parsed.value;
    } else if (target === 'installmentCount') {
      const parsed = parseInstallment(value);
      if (parsed.isErr()) return err(located(parsed.error, binding));
      row.installmentCount = parsed.value.count;
      if (parsed.value.index !== undefined && row.installmentIndex === undefined) {
        row.installmentIndex = parsed.value.index;
      }
    } else if (target === 'installmentIndex') {
      const parsed = parseInteger(value);
      if (parsed.isErr()) return err(located(parsed.error, binding));
      row.installmentIndex = parsed.value;
    } else {
      row[target] = String(value).trim();
    }
  }

  return ok(row);
}
