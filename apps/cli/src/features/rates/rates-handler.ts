import { NotFoundError, ValidationError } from '@posledger/core';
import { getLogger } from '@posledger/logger';
import {
  compareRateTables,
  validateInstallment,
  validateRate,
  type RateChange,
  type RateDocumentFormat,
  type RateImportSource,
  type RateManager,
} from '@posledger/rates';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { openRateManager, type CliPaths } from '../shared/cli-context.js';

import {
  commitRecord,
  differenceRecord,
  rateEntryRecords,
  type CommitRecord,
  type RateDifferenceRecord,
  type RateEntryRecord,
} from './rates-utils.js';

const logger = getLogger('RatesHandler');

export interface RateListResult {
  version: number;
  entries: RateEntryRecord[];
}

export interface RateLookupResult {
  bank: string;
  installment: number;
  rate: Decimal;
  version: number;
}

/**
 * Rates handler - the rate-table operations behind `posledger rates`.
 * Reads go against the manager's current snapshot; writes go through the
 * manager so they are serialized, backed up and audited.
 */
export class RatesHandler {
  constructor(private readonly manager: RateManager) {}

  list(): RateListResult {
    const table = this.manager.current();
    return { version: table.version, entries: rateEntryRecords(table) };
  }

  lookup(bank: string, installment: number): Result<RateLookupResult, Error> {
    const table = this.manager.current();
    const rate = table.lookup(bank, installment);
    if (rate.isErr()) {
      return err(rate.error);
    }
    return ok({
      bank: table.resolveBank(bank)?.id ?? bank,
      installment: Math.max(installment, 1),
      rate: rate.value,
      version: table.version,
    });
  }

  /**
   * What `set` would change, without committing anything.
   */
  preview(bank: string, rates: ReadonlyMap<number, string>): Result<RateDifferenceRecord[], Error> {
    const table = this.manager.current();
    const target = table.resolveBank(bank);
    if (!target) {
      return err(new NotFoundError(`Unknown bank "${bank}"`, { additionalContext: { bank } }));
    }

    const validated = new Map<number, Decimal>();
    for (const [installment, value] of rates) {
      const count = validateInstallment(installment);
      if (count.isErr()) return err(count.error);
      const rate = validateRate(value);
      if (rate.isErr()) return err(rate.error);
      validated.set(count.value, rate.value);
    }
    if (validated.size === 0) {
      return err(new ValidationError('No rates given', [], 'rates'));
    }

    return ok(compareRateTables(table, table.withRates(target.id, validated, table.version)).map(differenceRecord));
  }

  async set(bank: string, rates: ReadonlyMap<number, string>): Promise<Result<CommitRecord, Error>> {
    const result = await this.manager.updateMany(bank, rates, rates.size === 1 ? 'update' : 'bulk_update');
    if (result.isErr()) {
      return err(result.error);
    }
    logger.info({ bank, changes: result.value.changes.length, version: result.value.table.version }, 'Rates set');
    return ok(commitRecord(result.value));
  }

  async import(source: RateImportSource): Promise<Result<CommitRecord, Error>> {
    const result = await this.manager.importFrom(source);
    if (result.isErr()) {
      return err(result.error);
    }
    return ok(commitRecord(result.value));
  }

  async compare(source: RateImportSource): Promise<Result<RateDifferenceRecord[], Error>> {
    const result = await this.manager.compareWith(source);
    if (result.isErr()) {
      return err(result.error);
    }
    return ok(result.value.map(differenceRecord));
  }

  export(format: RateDocumentFormat): string {
    return this.manager.exportTo(format);
  }

  async history(limit: number): Promise<Result<RateChange[], Error>> {
    return this.manager.history(limit);
  }
}

export async function createRatesHandler(paths: CliPaths): Promise<Result<RatesHandler, Error>> {
  const manager = await openRateManager(paths);
  if (manager.isErr()) {
    return err(manager.error);
  }
  return ok(new RatesHandler(manager.value));
}
