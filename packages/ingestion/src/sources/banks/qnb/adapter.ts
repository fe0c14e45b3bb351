import type { CanonicalRow } from '../../../shared/types/canonical-row.js';
import { BaseSourceAdapter, type InstallmentFigures } from '../../../features/process/base-source-adapter.js';
import { installmentCountFromLabel } from '../shared/installment-utils.js';

const UNSPECIFIED_INSTALLMENT_COUNT = 2;

/**
 * QNB: refunds are negative settled amounts (sign rule in the
 * configuration). Without a count column the installment type decides:
 * "Taksitsiz"/"Peşin" → 1, otherwise the number in the label, else 2.
 */
export class QnbAdapter extends BaseSourceAdapter {
  protected override resolveInstallment(row: CanonicalRow): InstallmentFigures {
    if (row.installmentCount !== undefined) {
      return super.resolveInstallment(row);
    }
    return super.resolveInstallment({
      ...row,
      installmentCount: installmentCountFromLabel(row.transactionType, UNSPECIFIED_INSTALLMENT_COUNT),
    });
  }
}
