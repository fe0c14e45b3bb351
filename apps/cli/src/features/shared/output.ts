import * as p from '@clack/prompts';
import { getLogger, setLoggerTransports } from '@posledger/logger';
import pc from 'picocolors';

import { errorResponse, exitCodeName, successResponse } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

const ERROR_TIPS: Record<string, string> = {
  CONFIG_ERROR: 'Check banks.yaml, commission_rates.yaml and settings.yaml in the config directory (POSLEDGER_CONFIG_DIR).',
  INVALID_ARGS: 'Check your command arguments and try again.\nRun with --help for usage information.',
  NOT_FOUND: 'Run `posledger rates list` to see the known banks and installment counts.',
};

/**
 * OutputManager handles formatting and displaying CLI output.
 * Supports both human-readable text output and machine-readable JSON. In
 * JSON mode stdout carries only the response, so console logging is
 * switched off.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(private readonly format: OutputFormat = 'text') {
    if (format === 'json') {
      setLoggerTransports({ console: false });
    }
  }

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Output a success response (JSON mode only).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = successResponse(command, data, { duration_ms: Date.now() - this.startTime, ...metadata });
      process.stdout.write(`${JSON.stringify(response, undefined, 2)}\n`);
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeName(exitCode);

    if (this.format === 'json') {
      // stdout, not stderr, so callers can parse the response
      process.stdout.write(`${JSON.stringify(errorResponse(command, error, errorCode), undefined, 2)}\n`);
    } else {
      p.log.error(`${pc.red('Error')}: ${error.message}`);
      const tip = ERROR_TIPS[errorCode];
      if (tip) {
        p.note(tip, 'Tip');
      }
      if (process.env['NODE_ENV'] === 'development' && error.stack) {
        logger.debug({ stack: error.stack }, 'Stack trace');
      }
    }

    process.exit(exitCode);
  }

  spinner(): ReturnType<typeof p.spinner> | undefined {
    return this.format === 'json' ? undefined : p.spinner();
  }

  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  log(message: string): void {
    if (this.format === 'text') {
      p.log.message(message);
    }
  }

  info(message: string): void {
    if (this.format === 'text') {
      p.log.info(message);
    }
  }

  success(message: string): void {
    if (this.format === 'text') {
      p.log.success(message);
    }
  }

  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      logger.warn(message);
    }
  }

  /**
   * Raw text to stdout, for documents such as exported rate tables.
   */
  write(text: string): void {
    process.stdout.write(text);
  }
}
