import { DomainError } from '@posledger/core';

/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Resource not found (bank, rate, file) */
  NOT_FOUND: 4,

  /** Some input files could not be reconciled */
  PARTIAL_FAILURE: 5,

  /** Network or connectivity error */
  NETWORK_ERROR: 6,

  /** Rejected input value or document */
  VALIDATION_ERROR: 8,

  /** Operation cancelled by user */
  CANCELLED: 9,

  /** Configuration error */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const EXIT_CODES_BY_ERROR_CODE: Record<string, ExitCode> = {
  CONFIG_ERROR: ExitCodes.CONFIG_ERROR,
  NOT_FOUND: ExitCodes.NOT_FOUND,
  PARSE_ERROR: ExitCodes.VALIDATION_ERROR,
  RATE_IMPORT_ERROR: ExitCodes.VALIDATION_ERROR,
  RATE_UNDEFINED: ExitCodes.NOT_FOUND,
  SCHEMA_MISMATCH: ExitCodes.VALIDATION_ERROR,
  UNKNOWN_SOURCE: ExitCodes.NOT_FOUND,
  VALIDATION_ERROR: ExitCodes.VALIDATION_ERROR,
};

/**
 * Exit code for an error: domain errors by their code, anything else is a
 * general error.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof DomainError) {
    return EXIT_CODES_BY_ERROR_CODE[error.code] ?? ExitCodes.GENERAL_ERROR;
  }
  return ExitCodes.GENERAL_ERROR;
}
