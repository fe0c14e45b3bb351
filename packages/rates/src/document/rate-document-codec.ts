import path from 'node:path';

import { RateImportError, decimalToString, fromZod, getErrorMessage, zodIssueList } from '@posledger/core';
import { parse as parseCsv } from 'csv-parse/sync';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';

import { RateTable } from '../table/rate-table.js';

import {
  RateCsvRowSchema,
  RateDocumentSchema,
  type RateCsvRow,
  type RateDocumentFormat,
} from './rate-document.schemas.js';

export const RATE_CSV_HEADER = ['bank_key', 'bank_name', 'installment', 'rate', 'aliases'] as const;

const ALIAS_SEPARATOR = '|';

export function rateFormatFromPath(filePath: string): RateDocumentFormat | undefined {
  switch (path.extname(filePath).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.json':
      return 'json';
    case '.csv':
      return 'csv';
    default:
      return undefined;
  }
}

function invalidDocument(issues: string[]): RateImportError {
  return new RateImportError('Invalid rate document', issues);
}

function tableFromStructured(raw: unknown): Result<RateTable, RateImportError> {
  const parsed = fromZod(RateDocumentSchema, raw);
  if (parsed.isErr()) {
    return err(invalidDocument(zodIssueList(parsed.error)));
  }
  return ok(RateTable.fromDocument(parsed.value));
}

function tableFromCsv(content: string): Result<RateTable, RateImportError> {
  let records: unknown;
  try {
    records = parseCsv(content.replace(/^\uFEFF/, ''), { columns: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    return err(new RateImportError(`Malformed rate csv: ${getErrorMessage(error)}`));
  }

  const rows = fromZod(z.array(RateCsvRowSchema).min(1, 'No rate rows'), records);
  if (rows.isErr()) {
    // Row numbers in issues are 0-based record indexes; shift to file lines
    return err(
      invalidDocument(
        rows.error.issues.map((issue) => {
          const [index, ...rest] = issue.path;
          const location = typeof index === 'number' ? `line ${index + 2}${rest.length > 0 ? ` ${rest.join('.')}` : ''}` : '(root)';
          return `${location}: ${issue.message}`;
        })
      )
    );
  }

  return groupCsvRows(rows.value);
}

function groupCsvRows(rows: RateCsvRow[]): Result<RateTable, RateImportError> {
  const banks = new Map<string, { aliases: Set<string>; id: string; name: string; rates: Map<number, Decimal> }>();
  const issues: string[] = [];

  rows.forEach((row, index) => {
    let bank = banks.get(row.bank_key);
    if (!bank) {
      bank = { aliases: new Set(), id: row.bank_key, name: row.bank_name, rates: new Map() };
      banks.set(row.bank_key, bank);
    }
    if (bank.rates.has(row.installment)) {
      issues.push(`line ${index + 2}: duplicate rate for ${row.bank_key} installment ${row.installment}`);
    }
    bank.rates.set(row.installment, row.rate);
    for (const alias of row.aliases.split(ALIAS_SEPARATOR)) {
      if (alias.trim() !== '') bank.aliases.add(alias.trim());
    }
  });

  if (issues.length > 0) {
    return err(invalidDocument(issues));
  }
  return ok(new RateTable([...banks.values()].map((bank) => ({ ...bank, aliases: [...bank.aliases] })), 0));
}

/**
 * Parse a rate document. YAML and JSON carry the full table; csv rows are
 * grouped by bank key. Nothing is returned unless the whole document is
 * valid.
 */
export function parseRateDocument(content: string, format: RateDocumentFormat): Result<RateTable, RateImportError> {
  if (format === 'csv') {
    return tableFromCsv(content);
  }

  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    return err(new RateImportError(`Malformed rate ${format}: ${getErrorMessage(error)}`));
  }
  return tableFromStructured(raw);
}

// RFC 4180: quote fields with a comma, quote or newline; double inner quotes
function csvField(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}

function toCsv(table: RateTable): string {
  const lines = [RATE_CSV_HEADER.join(',')];
  for (const bank of table.banks) {
    for (const [installment, rate] of bank.rates) {
      lines.push(
        [bank.id, bank.name, String(installment), decimalToString(rate), bank.aliases.join(ALIAS_SEPARATOR)].map(csvField).join(',')
      );
    }
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Render a table in one of the document formats. Banks and installments are
 * ordered, so equal tables serialize to equal text. Rates are written as
 * decimal strings at full precision.
 */
export function serializeRateTable(table: RateTable, format: RateDocumentFormat): string {
  if (format === 'csv') {
    return toCsv(table);
  }

  if (format === 'json') {
    const banks = Object.fromEntries(
      table.banks.map((bank) => [
        bank.id,
        {
          name: bank.name,
          aliases: [...bank.aliases],
          rates: Object.fromEntries([...bank.rates].map(([installment, rate]) => [String(installment), decimalToString(rate)])),
        },
      ])
    );
    return `${JSON.stringify({ version: table.version, banks }, undefined, 2)}\n`;
  }

  // Map keeps installment counts as plain integer keys in the YAML output
  const banks = new Map(
    table.banks.map((bank) => [
      bank.id,
      {
        name: bank.name,
        aliases: [...bank.aliases],
        rates: new Map([...bank.rates].map(([installment, rate]) => [installment, decimalToString(rate)])),
      },
    ])
  );
  return stringifyYaml({ version: table.version, banks });
}
