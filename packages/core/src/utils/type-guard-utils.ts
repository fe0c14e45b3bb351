import { err, type Result } from 'neverthrow';

/**
 * Message of a thrown value. Libraries here throw Error instances; anything
 * else falls back to `fallback` or its string form.
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  if (error instanceof Error) {
    return error.message;
  }
  return fallback ?? String(error);
}

// "Failed to read banks.yaml: ENOENT: no such file or directory"
export function wrapError<T = never>(error: unknown, context: string): Result<T, Error> {
  return err(new Error(`${context}: ${getErrorMessage(error)}`));
}

/**
 * Node.js system errors carry a string `code` (ENOENT, EEXIST, ...).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
