import { normalizeText } from '@posledger/core';

const SINGLE_PAYMENT = ['pesin', 'tek', 'taksitsiz'];

/**
 * Installment count read off a transaction-type label such as "Peşin",
 * "3 Taksit" or "Taksitli". Labels that only say "installment" fall back
 * to `fallback`.
 */
export function installmentCountFromLabel(label: string | undefined, fallback: number): number | undefined {
  if (label === undefined) return undefined;

  const normalized = normalizeText(label);
  const words = normalized.split(' ');
  if (SINGLE_PAYMENT.some((marker) => words.includes(marker))) {
    return 1;
  }
  const digits = /(\d+)/.exec(normalized);
  if (digits) {
    return Math.max(Number(digits[1]), 1);
  }
  return fallback;
}
