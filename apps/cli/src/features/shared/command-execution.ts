import type { z } from 'zod';

import { ExitCodes } from './exit-codes.js';
import { OutputManager } from './output.js';
import { confirmOrCancel } from './prompts.js';

/**
 * Ask before a mutation unless `--yes` was given or the command runs in JSON
 * mode, where nobody is there to answer.
 */
export async function confirmUnlessSkipped(config: {
  cancelMessage: string;
  message: string;
  output: OutputManager;
  skip: boolean;
}): Promise<void> {
  if (config.skip || config.output.isJsonMode()) {
    return;
  }
  await confirmOrCancel(config.message, config.cancelMessage);
}

function hasJsonFlag(rawOptions: unknown): boolean {
  return typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
}

/**
 * Validate raw commander options at the CLI boundary. On failure the first
 * issue is reported (as JSON when `--json` was given) and the process exits
 * with INVALID_ARGS.
 */
export function parseCommandOptions<T extends { json?: boolean | undefined }>(
  command: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rawOptions: unknown
): { options: T; output: OutputManager } {
  const validationResult = schema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(hasJsonFlag(rawOptions) ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    return output.error(command, new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const options = validationResult.data;
  return { options, output: new OutputManager(options.json ? 'json' : 'text') };
}
