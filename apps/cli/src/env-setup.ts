/**
 * Environment setup for CLI - must be imported before any other modules
 *
 * Console logging competes with the command's own output, so the CLI logs
 * warnings and errors only unless LOGGER_LOG_LEVEL is set. CLI_LOG_LEVEL
 * overrides both.
 */

if (process.env['CLI_LOG_LEVEL'] !== undefined) {
  process.env['LOGGER_LOG_LEVEL'] = process.env['CLI_LOG_LEVEL'];
} else if (process.env['LOGGER_LOG_LEVEL'] === undefined) {
  process.env['LOGGER_LOG_LEVEL'] = 'warn';
}
