import { ParseError, type NumberFormat, type RateScale } from '@posledger/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { RawValue } from '../../shared/types/raw-table.js';

const CURRENCY_TOKENS = /(₺|\bTRY\b|\bTL\b)/gi;
const PLAIN_NUMBER = /^-?\d+(\.\d+)?$/;
// Zero-padded, explicitly signed fixed-width literal, e.g. +00000000000005038.80
const SIGNED_FIXED = /^([+-])?0*(\d*)(?:[.,](\d+))?$/;

function fail(raw: RawValue, format: NumberFormat): Result<Decimal, ParseError> {
  return err(new ParseError(`Unparseable ${format} number "${String(raw)}"`, { value: raw }));
}

function toDecimal(literal: string, raw: RawValue, format: NumberFormat): Result<Decimal, ParseError> {
  if (!PLAIN_NUMBER.test(literal)) {
    return fail(raw, format);
  }
  return ok(new Decimal(literal));
}

function parseSignedFixed(text: string, raw: RawValue): Result<Decimal, ParseError> {
  const match = SIGNED_FIXED.exec(text);
  if (!match || (match[2] === '' && match[3] === undefined)) {
    return fail(raw, 'signed-fixed');
  }
  const [, sign, integerPart, fraction] = match;
  const literal = `${sign === '-' ? '-' : ''}${integerPart || '0'}${fraction === undefined ? '' : `.${fraction}`}`;
  return toDecimal(literal, raw, 'signed-fixed');
}

// 1.234,56 → 1234.56
function parseTurkish(text: string, raw: RawValue): Result<Decimal, ParseError> {
  return toDecimal(text.replace(/\./g, '').replace(',', '.'), raw, 'tr');
}

// 1,234.56 → 1234.56
function parseEnglish(text: string, raw: RawValue): Result<Decimal, ParseError> {
  return toDecimal(text.replace(/,/g, ''), raw, 'en');
}

/**
 * Infer the separators: with both present the later one is the decimal
 * mark; a lone comma is decimal; several dots are thousands groups.
 */
function parseAuto(text: string, raw: RawValue): Result<Decimal, ParseError> {
  const lastComma = text.lastIndexOf(',');
  const lastDot = text.lastIndexOf('.');

  if (lastComma >= 0 && lastDot >= 0) {
    return lastComma > lastDot ? parseTurkish(text, raw) : parseEnglish(text, raw);
  }
  if (lastComma >= 0) {
    return text.indexOf(',') === lastComma ? parseTurkish(text, raw) : parseEnglish(text, raw);
  }
  if (lastDot >= 0 && text.indexOf('.') !== lastDot) {
    return parseTurkish(text, raw);
  }
  return toDecimal(text, raw, 'auto');
}

/**
 * Normalize a source numeric literal to a Decimal. Spreadsheet numbers are
 * taken as-is; strings are cleaned of currency markers, spaces and a leading
 * `+` before the bank's format is applied.
 */
export function parseAmount(raw: RawValue, format: NumberFormat): Result<Decimal, ParseError> {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? ok(new Decimal(raw)) : fail(raw, format);
  }
  if (typeof raw !== 'string') {
    return fail(raw, format);
  }

  let text = raw.replace(CURRENCY_TOKENS, '').replace(/\s/g, '');
  // (12,50) accounting negatives
  if (/^\(.*\)$/.test(text)) {
    text = `-${text.slice(1, -1)}`;
  }
  if (text === '' || text === '-' || text === '+') {
    return fail(raw, format);
  }

  switch (format) {
    case 'signed-fixed':
      return parseSignedFixed(text, raw);
    case 'tr':
      return parseTurkish(text.replace(/^\+/, ''), raw);
    case 'en':
      return parseEnglish(text.replace(/^\+/, ''), raw);
    case 'auto':
      return parseAuto(text.replace(/^\+/, ''), raw);
  }
}

/**
 * Bring a source commission rate to a fraction. `auto` treats anything
 * above 1 as a percentage.
 */
export function normalizeRate(rate: Decimal, scale: RateScale): Decimal {
  const magnitude = rate.abs();
  if (scale === 'percent' || (scale === 'auto' && magnitude.greaterThan(1))) {
    return magnitude.dividedBy(100);
  }
  return magnitude;
}

export interface InstallmentValue {
  count: number;
  index?: number | undefined;
}

const SINGLE_PAYMENT_MARKERS = ['pesin', 'peşin', 'tek', 'taksitsiz', 'single'];

/**
 * Installment cells: `3`, `3.0`, `6/2` (count 6, paying the 2nd), or a
 * single-payment word. Zero and blank mean a single payment.
 */
export function parseInstallment(raw: RawValue): Result<InstallmentValue, ParseError> {
  if (raw === null || raw === '') {
    return ok({ count: 1 });
  }
  if (typeof raw === 'number') {
    return Number.isInteger(raw) && raw >= 0
      ? ok({ count: Math.max(raw, 1) })
      : err(new ParseError(`Invalid installment count ${raw}`, { value: raw }));
  }

  const text = String(raw).trim().toLocaleLowerCase('tr-TR');
  const pair = /^(\d+)\s*\/\s*(\d+)$/.exec(text);
  if (pair) {
    const count = Math.max(Number(pair[1]), 1);
    const index = Math.max(Number(pair[2]), 1);
    if (index > count) {
      return err(new ParseError(`Installment number ${index} exceeds count ${count}`, { value: raw }));
    }
    return ok({ count, index });
  }
  const whole = /^(\d+)(?:[.,]0+)?$/.exec(text);
  if (whole) {
    return ok({ count: Math.max(Number(whole[1]), 1) });
  }
  if (SINGLE_PAYMENT_MARKERS.some((marker) => text.includes(marker))) {
    return ok({ count: 1 });
  }
  return err(new ParseError(`Invalid installment value "${String(raw)}"`, { value: raw }));
}

export function parseInteger(raw: RawValue): Result<number, ParseError> {
  if (typeof raw === 'number' && Number.isInteger(raw)) {
    return ok(raw);
  }
  const match = /^(\d+)(?:[.,]0+)?$/.exec(String(raw).trim());
  if (!match) {
    return err(new ParseError(`Invalid integer "${String(raw)}"`, { value: raw }));
  }
  return ok(Number(match[1]));
}
