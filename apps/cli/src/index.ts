#!/usr/bin/env node
import './env-setup.js';

import { registerAllBanks } from '@posledger/ingestion';
import { getLogger } from '@posledger/logger';
import { Command } from 'commander';

import { registerRatesCommand } from './features/rates/rates.js';
import { registerReconcileCommand } from './features/reconcile/reconcile.js';

// Register all bank adapters at startup
registerAllBanks();

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('posledger')
    .description('POS settlement reconciliation: bank exports, commission-rate checks and summaries')
    .version('0.1.0');

  registerReconcileCommand(program);
  registerRatesCommand(program);

  await program.parseAsync();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error({ stack: error.stack }, `Uncaught Exception: ${error.message}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.exit(1);
});
