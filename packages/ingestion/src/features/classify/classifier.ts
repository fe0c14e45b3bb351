import { containsNormalized, normalizeText, type ClassifierRule, type TransactionCategory } from '@posledger/core';

import { canonicalText, type CanonicalRow } from '../../shared/types/canonical-row.js';

/**
 * Assign sale or refund. Total: every row gets exactly one category and
 * anything without a refund indicator is a sale.
 */
export function classify(row: CanonicalRow, rule: ClassifierRule): TransactionCategory {
  switch (rule.kind) {
    case 'flag': {
      const value = canonicalText(row, rule.field);
      if (value === undefined) return 'sale';
      const normalized = normalizeText(value);
      return rule.refundValues.some((candidate) => normalizeText(candidate) === normalized) ? 'refund' : 'sale';
    }
    case 'description': {
      const isRefund = rule.fields.some((field) => {
        const value = canonicalText(row, field);
        return value !== undefined && rule.markers.some((marker) => containsNormalized(value, marker));
      });
      return isRefund ? 'refund' : 'sale';
    }
    case 'sign':
      return row.grossAmount?.isNegative() ? 'refund' : 'sale';
  }
}
