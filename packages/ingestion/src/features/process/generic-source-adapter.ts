import type { BankConfig } from '@posledger/core';

import { getSourceAdapterRegistration, type SourceAdapter } from '../../shared/types/source-adapter.js';

import { BaseSourceAdapter } from './base-source-adapter.js';

/**
 * Adapter for banks that need nothing beyond their configuration.
 */
export class GenericSourceAdapter extends BaseSourceAdapter {}

/**
 * The registered adapter for the bank, or the configuration-only adapter
 * when none is registered.
 */
export function createSourceAdapter(config: BankConfig): SourceAdapter {
  const registration = getSourceAdapterRegistration(config.id);
  return registration ? registration.create(config) : new GenericSourceAdapter(config);
}
