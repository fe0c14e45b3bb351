import type { Command } from 'commander';

import { registerRatesSetCommand } from './rates-set.js';
import { registerRatesTransferCommands } from './rates-transfer.js';
import { registerRatesViewCommands } from './rates-view.js';

/**
 * Register the rates command with all subcommands.
 *
 * Structure:
 *   rates list                      - Every bank, installment count and expected rate
 *   rates lookup <bank> <n>         - Expected rate for one bank and installment count
 *   rates history                   - Recent rate changes
 *   rates set <bank> <n=rate...>    - Change one bank's rates
 *   rates import --file|--url       - Replace the table with a document
 *   rates export                    - Print or write the table
 *   rates compare --file|--url      - Differences against a document
 */
export function registerRatesCommand(program: Command): void {
  const rates = program.command('rates').description('Manage expected commission rates');

  registerRatesViewCommands(rates);
  registerRatesSetCommand(rates);
  registerRatesTransferCommands(rates);
}
