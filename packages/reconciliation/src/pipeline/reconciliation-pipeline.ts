import type { GroupKey, PeriodGranularity } from '@posledger/core';
import type { Settings } from '@posledger/env';
import type { FileReport, IngestionService } from '@posledger/ingestion';
import { getLogger, type Logger } from '@posledger/logger';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { aggregate, filterSuccessful } from '../aggregation/aggregator.js';
import { summarizeControl, type ControlSummary } from '../aggregation/control-summary.js';
import type { Summary } from '../aggregation/summary.js';
import { RateVerifier, type RateLookup } from '../verification/rate-verifier.js';
import type { VerifiedTransaction } from '../verification/verified-transaction.js';

export interface ReconciliationOptions {
  groupBy: readonly GroupKey[];
  periodGranularity: PeriodGranularity;
  tolerance: Decimal;
}

export interface ReconciliationResult {
  files: FileReport[];
  /** Every parsed transaction, refunds included, in file then row order */
  verified: VerifiedTransaction[];
  /** Over successful sales only */
  summaries: Summary[];
  control: ControlSummary;
  rateTableVersion: number;
}

export function reconciliationOptionsFromSettings(settings: Settings): ReconciliationOptions {
  return {
    groupBy: settings.aggregation.groupBy,
    periodGranularity: settings.aggregation.periodGranularity,
    tolerance: new Decimal(settings.verification.tolerance),
  };
}

/**
 * Ingestion → verification → aggregation. Everything after ingestion is a
 * pure function of the file reports and the rate table snapshot, so a run
 * holds no state that outlives it.
 */
export class ReconciliationPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly ingestion: IngestionService,
    private readonly rates: RateLookup,
    private readonly options: ReconciliationOptions
  ) {
    this.logger = getLogger('ReconciliationPipeline');
  }

  async run(dir: string): Promise<Result<ReconciliationResult, Error>> {
    const reports = await this.ingestion.ingestDirectory(dir);
    if (reports.isErr()) {
      return err(reports.error);
    }
    return ok(this.reconcile(reports.value));
  }

  async runFiles(files: readonly string[]): Promise<ReconciliationResult> {
    return this.reconcile(await this.ingestion.ingestFiles(files));
  }

  reconcile(files: FileReport[]): ReconciliationResult {
    const verifier = new RateVerifier(this.rates, { tolerance: this.options.tolerance });
    const verified = verifier.verifyAll(files.flatMap((report) => report.transactions));
    const successful = filterSuccessful(verified);

    const summaries = aggregate(successful, this.options.groupBy, { periodGranularity: this.options.periodGranularity });
    const control = summarizeControl(successful);

    this.logger.info(
      {
        failedFiles: files.filter((report) => report.status === 'failed').length,
        files: files.length,
        refunds: verified.length - successful.length,
        summaries: summaries.length,
        transactions: verified.length,
      },
      'Reconciliation finished'
    );

    return { control, files, rateTableVersion: this.rates.version, summaries, verified };
  }
}
