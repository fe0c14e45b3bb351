import path from 'node:path';

import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  POSLEDGER_CONFIG_DIR: z.string().min(1).or(z.undefined()),
  POSLEDGER_DATA_DIR: z.string().min(1).or(z.undefined()),
  POSLEDGER_RATE_TOLERANCE: z
    .string()
    .regex(/^\d+(\.\d+)?$/, 'Must be a non-negative decimal number')
    .or(z.undefined()),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access and caches the result.
 * @throws Error listing every offending variable
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): ValidatedEnv {
  if (source !== process.env) {
    return parseEnv(source);
  }
  if (!validatedEnv) {
    validatedEnv = parseEnv(source);
  }
  return validatedEnv;
}

function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Directory holding banks.yaml, commission_rates.yaml and settings.yaml.
 *
 * POSLEDGER_CONFIG_DIR wins; otherwise `<cwd>/config`.
 */
export function getConfigDirectory(): string {
  return validateEnv().POSLEDGER_CONFIG_DIR ?? path.join(process.cwd(), 'config');
}

/**
 * Directory for run artefacts such as the rate history log.
 *
 * POSLEDGER_DATA_DIR wins; otherwise `<cwd>/data`. Unit tests should pass
 * temporary directories explicitly instead of relying on this.
 */
export function getDataDirectory(): string {
  return validateEnv().POSLEDGER_DATA_DIR ?? path.join(process.cwd(), 'data');
}
