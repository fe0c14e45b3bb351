import type { Command } from 'commander';

import { parseCommandOptions } from '../shared/command-execution.js';
import { defaultCliPaths, loadCliSettings } from '../shared/cli-context.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { JsonFlagSchema, RatesHistoryOptionsSchema, RatesLookupArgsSchema } from '../shared/schemas.js';

import { createRatesHandler } from './rates-handler.js';
import { formatEntries, formatHistory, formatRate } from './rates-utils.js';

export function registerRatesViewCommands(rates: Command): void {
  rates
    .command('list')
    .description('List every bank, installment count and expected rate')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeRatesListCommand(rawOptions);
    });

  rates
    .command('lookup')
    .description('Show the expected rate for a bank and installment count')
    .argument('<bank>', 'Bank id, name or alias')
    .argument('<installment>', 'Installment count')
    .option('--json', 'Output results in JSON format')
    .action(async (bank: string, installment: string, rawOptions: Record<string, unknown>) => {
      await executeRatesLookupCommand({ ...rawOptions, bank, installment });
    });

  rates
    .command('history')
    .description('Show recent rate changes, oldest first')
    .option('--limit <n>', 'Number of records to show (default: rates.historyLimit)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeRatesHistoryCommand(rawOptions);
    });
}

async function executeRatesListCommand(rawOptions: unknown): Promise<void> {
  const { output } = parseCommandOptions('rates list', JsonFlagSchema, rawOptions);

  const handler = await createRatesHandler(defaultCliPaths());
  if (handler.isErr()) {
    output.error('rates list', handler.error, exitCodeForError(handler.error));
    return;
  }

  const result = handler.value.list();
  if (output.isTextMode()) {
    if (result.entries.length === 0) {
      output.warn('The rate table is empty');
    } else {
      output.note(formatEntries(result.entries).join('\n'), `Commission rates (v${result.version})`);
    }
  }

  output.json('rates list', result);
  process.exit(ExitCodes.SUCCESS);
}

async function executeRatesLookupCommand(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('rates lookup', RatesLookupArgsSchema, rawOptions);

  const handler = await createRatesHandler(defaultCliPaths());
  if (handler.isErr()) {
    output.error('rates lookup', handler.error, exitCodeForError(handler.error));
    return;
  }

  const result = handler.value.lookup(options.bank, options.installment);
  if (result.isErr()) {
    output.error('rates lookup', result.error, exitCodeForError(result.error));
    return;
  }

  const { bank, installment, rate, version } = result.value;
  output.log(`${bank}, ${installment} installment(s): ${formatRate(rate)}`);
  output.json('rates lookup', { bank, installment, rate: rate.toString(), version });
  process.exit(ExitCodes.SUCCESS);
}

async function executeRatesHistoryCommand(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('rates history', RatesHistoryOptionsSchema, rawOptions);
  const paths = defaultCliPaths();

  const settings = await loadCliSettings(paths);
  if (settings.isErr()) {
    output.error('rates history', settings.error, exitCodeForError(settings.error));
    return;
  }
  const handler = await createRatesHandler(paths);
  if (handler.isErr()) {
    output.error('rates history', handler.error, exitCodeForError(handler.error));
    return;
  }

  const history = await handler.value.history(options.limit ?? settings.value.rates.historyLimit);
  if (history.isErr()) {
    output.error('rates history', history.error, exitCodeForError(history.error));
    return;
  }

  if (output.isTextMode()) {
    if (history.value.length === 0) {
      output.info('No rate changes recorded');
    } else {
      output.note(formatHistory(history.value).join('\n'), 'Rate history');
    }
  }

  output.json('rates history', { changes: history.value });
  process.exit(ExitCodes.SUCCESS);
}
