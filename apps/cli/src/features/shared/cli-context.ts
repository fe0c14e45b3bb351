import path from 'node:path';

import type { BankConfig } from '@posledger/core';
import { getConfigDirectory, getDataDirectory, loadSettings, type Settings } from '@posledger/env';
import { BANKS_FILENAME, loadBankConfigs } from '@posledger/ingestion';
import {
  FileRateTableStore,
  JsonlRateHistoryLog,
  RATES_FILENAME,
  RATE_HISTORY_FILENAME,
  RateManager,
  type FetchFn,
} from '@posledger/rates';
import type { Result } from 'neverthrow';

export interface CliPaths {
  configDir: string;
  dataDir: string;
}

export function defaultCliPaths(): CliPaths {
  return { configDir: getConfigDirectory(), dataDir: getDataDirectory() };
}

export async function loadCliSettings(paths: CliPaths): Promise<Result<Settings, Error>> {
  return loadSettings(paths.configDir);
}

export async function loadCliBankConfigs(paths: CliPaths): Promise<Result<BankConfig[], Error>> {
  return loadBankConfigs(path.join(paths.configDir, BANKS_FILENAME));
}

/**
 * Rate manager over `<configDir>/commission_rates.yaml` with its history in
 * `<dataDir>/rate_history.jsonl`.
 */
export async function openRateManager(
  paths: CliPaths,
  options: { actor?: string | undefined; fetch?: FetchFn | undefined } = {}
): Promise<Result<RateManager, Error>> {
  const store = new FileRateTableStore(path.join(paths.configDir, RATES_FILENAME));
  const history = new JsonlRateHistoryLog(path.join(paths.dataDir, RATE_HISTORY_FILENAME));
  return RateManager.open(store, history, {
    actor: options.actor ?? process.env['USER'] ?? 'cli',
    fetch: options.fetch,
  });
}
