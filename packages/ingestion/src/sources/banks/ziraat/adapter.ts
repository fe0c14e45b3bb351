import { BaseSourceAdapter } from '../../../features/process/base-source-adapter.js';

/**
 * Ziraat: the installment count is only filled for instalment sales, so a
 * blank count is a single payment (the base default). Rates are percentages
 * and refunds are marked "İade" in the transaction type; both come from the
 * configuration.
 */
export class ZiraatAdapter extends BaseSourceAdapter {}
