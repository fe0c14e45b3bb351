import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

/**
 * Validates an input against a Zod schema and returns a neverthrow Result.
 */
export function fromZod<T, TInput = T>(schema: ZodType<T, ZodTypeDef, TInput>, input: unknown): Result<T, ZodError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/**
 * One `path: message` entry per issue, joined with "; ".
 */
export function formatZodIssues(error: ZodError): string {
  return zodIssueList(error).join('; ');
}

export function zodIssueList(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
