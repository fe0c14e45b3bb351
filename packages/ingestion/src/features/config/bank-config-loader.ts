import fs from 'node:fs/promises';

import {
  BanksDocumentSchema,
  ConfigurationError,
  fromZod,
  getErrorMessage,
  zodIssueList,
  type BankConfig,
} from '@posledger/core';
import { getLogger } from '@posledger/logger';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

const logger = getLogger('BankConfigLoader');

export const BANKS_FILENAME = 'banks.yaml';

/**
 * Parse and validate a `banks.yaml` document. Declaration order is kept:
 * it is the order filename patterns are tried in.
 */
export function parseBanksDocument(content: string, source = BANKS_FILENAME): Result<BankConfig[], ConfigurationError> {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    return err(new ConfigurationError(`Invalid YAML in ${source}: ${getErrorMessage(error)}`));
  }

  const parsed = fromZod(BanksDocumentSchema, raw);
  if (parsed.isErr()) {
    const issues = zodIssueList(parsed.error);
    return err(
      new ConfigurationError(`Invalid bank configuration in ${source}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, {
        additionalContext: { issues, source },
      })
    );
  }

  return ok(parsed.value.banks);
}

export async function loadBankConfigs(filePath: string): Promise<Result<BankConfig[], ConfigurationError>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return err(new ConfigurationError(`Cannot read bank configuration ${filePath}: ${getErrorMessage(error)}`));
  }

  const result = parseBanksDocument(content, filePath);
  if (result.isOk()) {
    logger.debug({ banks: result.value.map((bank) => bank.id), filePath }, 'Loaded bank configuration');
  }
  return result;
}
