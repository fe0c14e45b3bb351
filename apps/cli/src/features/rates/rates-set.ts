import type { Command } from 'commander';

import { confirmUnlessSkipped, parseCommandOptions } from '../shared/command-execution.js';
import { defaultCliPaths } from '../shared/cli-context.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { RatesSetArgsSchema } from '../shared/schemas.js';

import { createRatesHandler } from './rates-handler.js';
import { formatDifferences } from './rates-utils.js';

export function registerRatesSetCommand(rates: Command): void {
  rates
    .command('set')
    .description('Set expected rates for one bank, e.g. `rates set vakifbank 1=0.0336 3=0.0499`')
    .argument('<bank>', 'Bank id, name or alias')
    .argument('<rates...>', 'INSTALLMENT=RATE pairs, rates as fractions')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--json', 'Output results in JSON format')
    .action(async (bank: string, pairs: string[], rawOptions: Record<string, unknown>) => {
      await executeRatesSetCommand({ ...rawOptions, bank, rates: pairs });
    });
}

async function executeRatesSetCommand(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('rates set', RatesSetArgsSchema, rawOptions);

  const handler = await createRatesHandler(defaultCliPaths());
  if (handler.isErr()) {
    output.error('rates set', handler.error, exitCodeForError(handler.error));
    return;
  }

  const preview = handler.value.preview(options.bank, options.rates);
  if (preview.isErr()) {
    output.error('rates set', preview.error, exitCodeForError(preview.error));
    return;
  }

  if (preview.value.length === 0) {
    output.info('Rates unchanged');
    output.json('rates set', { changes: [] });
    process.exit(ExitCodes.SUCCESS);
  }

  output.note(formatDifferences(preview.value).join('\n'), 'Pending changes');
  await confirmUnlessSkipped({
    cancelMessage: 'Rate update cancelled',
    message: 'Apply these rates?',
    output,
    skip: options.yes === true,
  });

  const result = await handler.value.set(options.bank, options.rates);
  if (result.isErr()) {
    output.error('rates set', result.error, exitCodeForError(result.error));
    return;
  }

  output.success(`Rate table is now version ${result.value.version}`);
  if (result.value.backup) {
    output.info(`Previous table backed up to ${result.value.backup}`);
  }
  output.json('rates set', result.value);
  process.exit(ExitCodes.SUCCESS);
}
