import type { BankConfig } from '@posledger/core';
import { IngestionService, type IngestionOptions } from '@posledger/ingestion';
import { getLogger } from '@posledger/logger';
import { ReconciliationPipeline, type RateLookup, type ReconciliationResult } from '@posledger/reconciliation';
import { err, type Result } from 'neverthrow';

import type { ReconcileHandlerParams } from './reconcile-utils.js';

export type { ReconcileHandlerParams };

const logger = getLogger('ReconcileHandler');

/**
 * Reconcile handler - wires ingestion, the rate table snapshot and the
 * pipeline for one run over a directory.
 */
export class ReconcileHandler {
  constructor(
    private readonly configs: readonly BankConfig[],
    private readonly rates: RateLookup,
    private readonly ingestionOptions: IngestionOptions
  ) {}

  async execute(params: ReconcileHandlerParams): Promise<Result<ReconciliationResult, Error>> {
    logger.info(
      { dir: params.dir, groupBy: params.groupBy, rateTableVersion: this.rates.version, tolerance: params.tolerance.toString() },
      'Starting reconciliation'
    );

    try {
      const pipeline = new ReconciliationPipeline(new IngestionService(this.configs, this.ingestionOptions), this.rates, {
        groupBy: params.groupBy,
        periodGranularity: params.periodGranularity,
        tolerance: params.tolerance,
      });
      return await pipeline.run(params.dir);
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }
}
