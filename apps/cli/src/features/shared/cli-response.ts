import { DomainError, RateImportError } from '@posledger/core';

import { ExitCodes, type ExitCode } from './exit-codes.js';

export interface CliErrorBody {
  /** Exit code name, e.g. NOT_FOUND */
  code: string;
  message: string;
  /** Domain error code behind the failure when it is more specific, e.g. SCHEMA_MISMATCH */
  reason?: string;
  /** One entry per problem in a rejected rate document */
  issues?: string[];
}

/**
 * Envelope written to stdout by every command run with --json.
 */
export interface CliResponse<T> {
  success: boolean;
  command: string;
  timestamp: string;
  data?: T;
  error?: CliErrorBody;
  metadata?: Record<string, unknown>;
}

export function successResponse<T>(command: string, data: T, metadata?: Record<string, unknown>): CliResponse<T> {
  const response: CliResponse<T> = { success: true, command, timestamp: new Date().toISOString(), data };
  if (metadata) {
    response.metadata = metadata;
  }
  return response;
}

export function errorResponse(command: string, error: Error, code: string): CliResponse<never> {
  const body: CliErrorBody = { code, message: error.message };
  if (error instanceof DomainError && error.code !== code) {
    body.reason = error.code;
  }
  if (error instanceof RateImportError && error.issues.length > 0) {
    body.issues = [...error.issues];
  }
  return { success: false, command, timestamp: new Date().toISOString(), error: body };
}

const EXIT_CODE_NAMES = new Map<number, string>(Object.entries(ExitCodes).map(([name, value]) => [value, name]));

export function exitCodeName(exitCode: ExitCode): string {
  return EXIT_CODE_NAMES.get(exitCode) ?? 'UNKNOWN_ERROR';
}
