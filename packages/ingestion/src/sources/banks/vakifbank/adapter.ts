import type { RawRow } from '../../../shared/types/raw-table.js';
import type { CanonicalRow } from '../../../shared/types/canonical-row.js';
import { BaseSourceAdapter } from '../../../features/process/base-source-adapter.js';

// Transaction type codes used in the settlement export
export const VAKIFBANK_TYPE_CODES: Readonly<Record<string, string>> = {
  TEK: 'Tek Çekim',
  TKS: 'Taksit',
};

/**
 * Vakıfbank: `;`-separated ISO-8859-9 CSV with zero-padded signed amounts
 * (`+00000000000005038.80`). Type codes are expanded to their labels; a
 * TEK row is a single payment whatever the installment column says.
 */
export class VakifbankAdapter extends BaseSourceAdapter {
  protected override adjustRow(row: CanonicalRow, _raw: RawRow): CanonicalRow {
    const code = row.transactionType?.trim().toUpperCase();
    const label = code === undefined ? undefined : VAKIFBANK_TYPE_CODES[code];
    if (label === undefined) {
      return row;
    }
    return {
      ...row,
      installmentCount: code === 'TEK' ? 1 : row.installmentCount,
      transactionType: label,
    };
  }
}
