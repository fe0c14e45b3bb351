import fs from 'node:fs/promises';
import path from 'node:path';

import { GroupKeySchema, PeriodGranularitySchema, fromZod, formatZodIssues, hasErrorCode, wrapError } from '@posledger/core';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { validateEnv } from './config.js';

const ToleranceSchema = z
  .union([z.string(), z.number()])
  .transform((val) => String(val))
  .refine((val) => /^\d+(\.\d+)?$/.test(val), { message: 'Tolerance must be a non-negative decimal number' });

export const SettingsSchema = z.object({
  aggregation: z
    .object({
      groupBy: z.array(GroupKeySchema).default(['bank', 'period', 'installment']),
      periodGranularity: PeriodGranularitySchema.default('month'),
    })
    .default({}),
  ingestion: z
    .object({
      concurrency: z.number().int().positive().default(8),
      rowErrorPolicy: z.enum(['skip', 'abort']).default('skip'),
    })
    .default({}),
  rates: z
    .object({
      historyLimit: z.number().int().positive().default(100),
    })
    .default({}),
  verification: z
    .object({
      tolerance: ToleranceSchema.default('0.01'),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const SETTINGS_FILENAME = 'settings.yaml';

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * Parse a settings document. `POSLEDGER_RATE_TOLERANCE` overrides the
 * document's tolerance when set.
 */
export function parseSettings(content: string, env: NodeJS.ProcessEnv = process.env): Result<Settings, Error> {
  let raw: unknown;
  try {
    raw = parseYaml(content) ?? {};
  } catch (error) {
    return wrapError(error, 'Invalid settings YAML');
  }

  const parsed = fromZod(SettingsSchema, raw);
  if (parsed.isErr()) {
    return err(new Error(`Invalid settings: ${formatZodIssues(parsed.error)}`));
  }

  const settings = parsed.value;
  const override = validateEnv(env).POSLEDGER_RATE_TOLERANCE;
  if (override !== undefined) {
    return ok({ ...settings, verification: { ...settings.verification, tolerance: override } });
  }
  return ok(settings);
}

/**
 * Load `settings.yaml` from a config directory; a missing file yields defaults.
 */
export async function loadSettings(
  configDir: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Result<Settings, Error>> {
  const filePath = path.join(configDir, SETTINGS_FILENAME);
  try {
    const content = await fs.readFile(filePath, 'utf8');
    return parseSettings(content, env);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return parseSettings('', env);
    }
    return wrapError(error, `Failed to read ${filePath}`);
  }
}
