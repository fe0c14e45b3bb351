import fs from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import { confirmUnlessSkipped, parseCommandOptions } from '../shared/command-execution.js';
import { defaultCliPaths } from '../shared/cli-context.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { RatesExportOptionsSchema, RatesSourceOptionsSchema } from '../shared/schemas.js';

import { createRatesHandler } from './rates-handler.js';
import { formatDifferences, sourceFromOptions } from './rates-utils.js';

export function registerRatesTransferCommands(rates: Command): void {
  rates
    .command('import')
    .description('Replace the rate table with a YAML, JSON or CSV document')
    .option('--file <path>', 'Document on disk (format from the extension)')
    .option('--url <url>', 'Document served over HTTP (YAML or JSON)')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeRatesImportCommand(rawOptions);
    });

  rates
    .command('export')
    .description('Print the rate table, or write it to a file')
    .option('--format <type>', 'Document format (yaml|json|csv)', 'yaml')
    .option('--output <file>', 'Output file path')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeRatesExportCommand(rawOptions);
    });

  rates
    .command('compare')
    .description('Show how a document differs from the current rate table')
    .option('--file <path>', 'Document on disk (format from the extension)')
    .option('--url <url>', 'Document served over HTTP (YAML or JSON)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeRatesCompareCommand(rawOptions);
    });
}

async function executeRatesImportCommand(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('rates import', RatesSourceOptionsSchema, rawOptions);

  const source = sourceFromOptions(options);
  if (source.isErr()) {
    output.error('rates import', source.error, ExitCodes.INVALID_ARGS);
    return;
  }
  const handler = await createRatesHandler(defaultCliPaths());
  if (handler.isErr()) {
    output.error('rates import', handler.error, exitCodeForError(handler.error));
    return;
  }

  if (output.isTextMode()) {
    const differences = await handler.value.compare(source.value);
    if (differences.isErr()) {
      output.error('rates import', differences.error, exitCodeForError(differences.error));
      return;
    }
    if (differences.value.length > 0) {
      output.note(formatDifferences(differences.value).join('\n'), 'Pending changes');
    }
  }

  await confirmUnlessSkipped({
    cancelMessage: 'Import cancelled',
    message: 'Replace the rate table?',
    output,
    skip: options.yes === true,
  });

  const result = await handler.value.import(source.value);
  if (result.isErr()) {
    output.error('rates import', result.error, exitCodeForError(result.error));
    return;
  }

  output.success(`Imported ${result.value.changes.length} change(s); rate table is now version ${result.value.version}`);
  output.json('rates import', result.value);
  process.exit(ExitCodes.SUCCESS);
}

async function executeRatesExportCommand(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('rates export', RatesExportOptionsSchema, rawOptions);

  const handler = await createRatesHandler(defaultCliPaths());
  if (handler.isErr()) {
    output.error('rates export', handler.error, exitCodeForError(handler.error));
    return;
  }

  const content = handler.value.export(options.format);

  if (!options.output) {
    if (output.isTextMode()) {
      output.write(content);
    }
    output.json('rates export', { content, format: options.format });
    process.exit(ExitCodes.SUCCESS);
  }

  const outputPath = path.resolve(options.output);
  try {
    await fs.writeFile(outputPath, content, 'utf8');
  } catch (error) {
    output.error('rates export', error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
    return;
  }

  output.success(`Rate table written to ${outputPath}`);
  output.json('rates export', { format: options.format, outputPath });
  process.exit(ExitCodes.SUCCESS);
}

async function executeRatesCompareCommand(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('rates compare', RatesSourceOptionsSchema, rawOptions);

  const source = sourceFromOptions(options);
  if (source.isErr()) {
    output.error('rates compare', source.error, ExitCodes.INVALID_ARGS);
    return;
  }
  const handler = await createRatesHandler(defaultCliPaths());
  if (handler.isErr()) {
    output.error('rates compare', handler.error, exitCodeForError(handler.error));
    return;
  }

  const differences = await handler.value.compare(source.value);
  if (differences.isErr()) {
    output.error('rates compare', differences.error, exitCodeForError(differences.error));
    return;
  }

  if (output.isTextMode()) {
    if (differences.value.length === 0) {
      output.info('No differences');
    } else {
      output.note(formatDifferences(differences.value).join('\n'), `${differences.value.length} difference(s)`);
    }
  }
  output.json('rates compare', { differences: differences.value });
  process.exit(ExitCodes.SUCCESS);
}
