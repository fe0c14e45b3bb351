import { normalizeText } from '@posledger/core';

import type { CanonicalRow } from '../../../shared/types/canonical-row.js';
import { BaseSourceAdapter } from '../../../features/process/base-source-adapter.js';

// Penalty refunds and service fees: bank adjustments, not card sales
const ADJUSTMENT_CODES = ['pnlt', 'pucrt'];

/**
 * Garanti BBVA: Turkish-locale numbers and DD.MM.YYYY dates. Adjustment rows
 * carry an exact type code; they are dropped before classification.
 */
export class GarantiAdapter extends BaseSourceAdapter {
  protected override exclusionReason(row: CanonicalRow): string | undefined {
    const code = row.transactionType === undefined ? undefined : normalizeText(row.transactionType);
    if (code !== undefined && ADJUSTMENT_CODES.includes(code)) {
      return code.toUpperCase();
    }
    return super.exclusionReason(row);
  }
}
