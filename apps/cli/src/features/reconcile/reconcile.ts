import fs from 'node:fs/promises';
import path from 'node:path';

import { serializeSummaries, type ReconciliationResult } from '@posledger/reconciliation';
import type { Command } from 'commander';

import { parseCommandOptions } from '../shared/command-execution.js';
import { defaultCliPaths, loadCliBankConfigs, loadCliSettings, openRateManager } from '../shared/cli-context.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import type { OutputManager } from '../shared/output.js';
import { ReconcileCommandOptionsSchema, type ReconcileCommandOptions } from '../shared/schemas.js';

import { ReconcileHandler } from './reconcile-handler.js';
import {
  buildReconcileParams,
  buildReconcileReport,
  formatControl,
  formatFileReports,
  formatSummaryTable,
  hasFailedFiles,
} from './reconcile-utils.js';

/**
 * Register the reconcile command.
 */
export function registerReconcileCommand(program: Command): void {
  program
    .command('reconcile')
    .description('Parse every bank file in a directory, verify commission rates and print summaries')
    .argument('[dir]', 'Directory with bank export files (default: the data directory)')
    .option('--group-by <keys>', 'Comma-separated summary keys: bank, period, installment')
    .option('--period <granularity>', 'Period granularity (day|month|year)')
    .option('--output <file>', 'Write the summaries as JSON to a file')
    .option('--transactions', 'Include every verified transaction in JSON output')
    .option('--json', 'Output results in JSON format')
    .action(async (dir: string | undefined, rawOptions: unknown) => {
      await executeReconcileCommand(dir, rawOptions);
    });
}

async function executeReconcileCommand(dir: string | undefined, rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('reconcile', ReconcileCommandOptionsSchema, rawOptions);
  const paths = defaultCliPaths();

  const settings = await loadCliSettings(paths);
  if (settings.isErr()) {
    output.error('reconcile', settings.error, exitCodeForError(settings.error));
    return;
  }
  const configs = await loadCliBankConfigs(paths);
  if (configs.isErr()) {
    output.error('reconcile', configs.error, exitCodeForError(configs.error));
    return;
  }
  const manager = await openRateManager(paths);
  if (manager.isErr()) {
    output.error('reconcile', manager.error, exitCodeForError(manager.error));
    return;
  }

  const params = buildReconcileParams(dir, options, settings.value, paths.dataDir);
  const handler = new ReconcileHandler(configs.value, manager.value.current(), settings.value.ingestion);

  output.intro('posledger reconcile');
  const spinner = output.spinner();
  spinner?.start(`Reconciling ${params.dir}`);

  const result = await handler.execute(params);
  if (result.isErr()) {
    spinner?.stop('Reconciliation failed');
    output.error('reconcile', result.error, exitCodeForError(result.error));
    return;
  }
  spinner?.stop(`Reconciled ${result.value.files.length} files`);

  await handleReconcileSuccess(output, result.value, params.dir, options);
}

async function handleReconcileSuccess(
  output: OutputManager,
  result: ReconciliationResult,
  dir: string,
  options: ReconcileCommandOptions
): Promise<void> {
  const report = buildReconcileReport(result, options.transactions === true);

  let outputPath: string | undefined;
  if (options.output) {
    outputPath = path.resolve(options.output);
    try {
      await fs.writeFile(outputPath, serializeSummaries(result.summaries), 'utf8');
    } catch (error) {
      output.error('reconcile', error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
      return;
    }
  }

  const partial = hasFailedFiles(result);

  if (output.isTextMode()) {
    output.log(formatFileReports(report.files, dir).join('\n'));
    if (report.summaries.length > 0) {
      output.note(formatSummaryTable(report.summaries).join('\n'), 'Summaries');
    } else {
      output.warn('No successful transactions to summarize');
    }
    output.note(formatControl(report.control), `Control totals (rate table v${report.rateTableVersion})`);
    if (outputPath) {
      output.info(`Summaries written to ${outputPath}`);
    }
    output.outro(partial ? 'Finished with failed files' : 'Reconciliation complete');
  }

  output.json('reconcile', report, { outputPath, partial });
  process.exit(partial ? ExitCodes.PARTIAL_FAILURE : ExitCodes.SUCCESS);
}
