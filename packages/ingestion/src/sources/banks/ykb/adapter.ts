import type { CanonicalRow } from '../../../shared/types/canonical-row.js';
import type { RawRow } from '../../../shared/types/raw-table.js';
import { BaseSourceAdapter } from '../../../features/process/base-source-adapter.js';

/**
 * Yapı Kredi: commission is the installment commission plus the contribution
 * fee (both mapped onto commissionAmount and summed). Refunds are flagged by
 * the message type and may carry a negative commission; the rate is always
 * derived from the summed commission.
 */
export class YkbAdapter extends BaseSourceAdapter {
  protected override adjustRow(row: CanonicalRow, _raw: RawRow): CanonicalRow {
    if (row.commissionRate === undefined) {
      return row;
    }
    const { commissionRate: _ignored, ...rest } = row;
    return rest;
  }
}
