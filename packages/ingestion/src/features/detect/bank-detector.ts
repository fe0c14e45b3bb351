import path from 'node:path';

import { UnknownSourceError, normalizeText, type BankConfig } from '@posledger/core';
import { err, ok, type Result } from 'neverthrow';

import { indexHeader } from '../mapping/schema-mapper.js';

// Share of a variant's required columns a header must contain
export const MIN_HEADER_OVERLAP = 0.6;

/**
 * First configuration whose pattern matches the file name wins.
 */
export function detectBankByFilename(filePath: string, configs: readonly BankConfig[]): Result<BankConfig, UnknownSourceError> {
  const name = path.basename(filePath);
  const folded = normalizeText(name);

  for (const config of configs) {
    const pattern = new RegExp(config.filePattern, 'i');
    if (pattern.test(name) || pattern.test(folded)) {
      return ok(config);
    }
  }
  return err(new UnknownSourceError(filePath));
}

/**
 * Best overlap between the header and any variant's required columns.
 */
export function headerOverlap(header: readonly string[], config: BankConfig): number {
  const present = indexHeader(header);
  let best = 0;
  for (const variant of config.variants) {
    const required = variant.columns.filter((mapping) => mapping.required);
    if (required.length === 0) continue;
    const hits = required.filter((mapping) => present.has(normalizeText(mapping.source))).length;
    best = Math.max(best, hits / required.length);
  }
  return best;
}

/**
 * Content-based fallback for files whose names match no pattern. `headerFor`
 * yields the header as read with a given bank's reader settings, or
 * undefined when the file cannot be read that way. Ties go to the
 * configuration declared first.
 */
export function detectBankByHeader(
  filePath: string,
  headerFor: (config: BankConfig) => readonly string[] | undefined,
  configs: readonly BankConfig[]
): Result<BankConfig, UnknownSourceError> {
  let best: { config: BankConfig; score: number } | undefined;
  for (const config of configs) {
    const header = headerFor(config);
    if (header === undefined) continue;
    const score = headerOverlap(header, config);
    if (score >= MIN_HEADER_OVERLAP && (!best || score > best.score)) {
      best = { config, score };
    }
  }
  return best ? ok(best.config) : err(new UnknownSourceError(filePath));
}
