import type { Decimal } from 'decimal.js';
import { ok, type Result } from 'neverthrow';
import type { ParseError } from '@posledger/core';

import type { CanonicalRow } from '../../../shared/types/canonical-row.js';
import { BaseSourceAdapter, deriveRate, type CommissionFigures } from '../../../features/process/base-source-adapter.js';

/**
 * Akbank: two historical layouts. The current one reports the real
 * commission in EO_KES_TUTAR (KOMISYON_TUTAR there is usually zero and is
 * not mapped). Any rate column is ignored; the rate is always
 * commission / gross.
 */
export class AkbankAdapter extends BaseSourceAdapter {
  protected override resolveCommission(row: CanonicalRow, gross: Decimal): Result<CommissionFigures, ParseError> {
    if (row.commissionAmount === undefined) {
      return super.resolveCommission(row, gross);
    }
    return ok(deriveRate(row.commissionAmount.abs(), gross));
  }
}
