import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import type { BankConfig } from '@posledger/core';

import { BANKS_FILENAME, parseBanksDocument } from '../../features/config/bank-config-loader.js';

export const SHIPPED_BANKS_PATH = fileURLToPath(new URL(`../../../../../config/${BANKS_FILENAME}`, import.meta.url));

let cached: BankConfig[] | undefined;

export function shippedBankConfigs(): BankConfig[] {
  cached ??= parseBanksDocument(readFileSync(SHIPPED_BANKS_PATH, 'utf8'), SHIPPED_BANKS_PATH)._unsafeUnwrap();
  return cached;
}

export function shippedBankConfig(id: string): BankConfig {
  const config = shippedBankConfigs().find((candidate) => candidate.id === id);
  if (!config) {
    throw new Error(`Bank ${id} is not in ${BANKS_FILENAME}`);
  }
  return config;
}
