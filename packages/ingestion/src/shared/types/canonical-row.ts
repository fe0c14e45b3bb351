import type { CanonicalField } from '@posledger/core';
import type { Decimal } from 'decimal.js';

export type AmountField = 'grossAmount' | 'commissionAmount' | 'blockedAmount';
export type DateField = 'transactionDate' | 'settlementDate';

/**
 * Typed values keyed by canonical field. Amounts keep their source sign
 * here; the adapter turns them into magnitudes after classification.
 */
export interface CanonicalRow {
  transactionDate?: string;
  settlementDate?: string;
  grossAmount?: Decimal;
  commissionAmount?: Decimal;
  commissionRate?: Decimal;
  blockedAmount?: Decimal;
  installmentCount?: number;
  installmentIndex?: number;
  cardType?: string;
  transactionType?: string;
  description?: string;
  status?: string;
  refundFlag?: string;
  transactionId?: string;
}

const AMOUNT_FIELDS: readonly CanonicalField[] = ['grossAmount', 'commissionAmount', 'blockedAmount'];
const DATE_FIELDS: readonly CanonicalField[] = ['transactionDate', 'settlementDate'];

export function isAmountField(field: CanonicalField): field is AmountField {
  return AMOUNT_FIELDS.includes(field);
}

export function isDateField(field: CanonicalField): field is DateField {
  return DATE_FIELDS.includes(field);
}

/**
 * String form of any canonical value, for rules that match on text.
 */
export function canonicalText(row: CanonicalRow, field: CanonicalField): string | undefined {
  const value = row[field];
  if (value === undefined) return undefined;
  return typeof value === 'object' ? value.toString() : String(value);
}
