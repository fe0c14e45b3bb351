import type { CanonicalRow } from '../../../shared/types/canonical-row.js';
import { BaseSourceAdapter, type InstallmentFigures } from '../../../features/process/base-source-adapter.js';
import { installmentCountFromLabel } from '../shared/installment-utils.js';

// Count assumed for an instalment sale whose label gives no number
const UNSPECIFIED_INSTALLMENT_COUNT = 2;

/**
 * Halkbank: percentage rates, and no installment column in the export. The
 * count comes from the transaction type ("Peşin" → 1, "Taksitli" → 2).
 */
export class HalkbankAdapter extends BaseSourceAdapter {
  protected override resolveInstallment(row: CanonicalRow): InstallmentFigures {
    if (row.installmentCount !== undefined) {
      return super.resolveInstallment(row);
    }
    const count = installmentCountFromLabel(row.transactionType, UNSPECIFIED_INSTALLMENT_COUNT);
    return super.resolveInstallment({ ...row, installmentCount: count });
  }
}
