/**
 * Error hierarchy for the reconciliation pipeline.
 *
 * File-level errors (UnknownSourceError, SchemaMismatchError) end one file's
 * processing; ParseError is row-level and normally recorded as a skipped row;
 * ValidationError and the rate errors come back from rate-table operations.
 */

export interface ErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
}

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: ErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * No bank configuration claimed the file.
 */
export class UnknownSourceError extends DomainError {
  readonly code = 'UNKNOWN_SOURCE';
  readonly severity = 'error' as const;

  constructor(public readonly file: string) {
    super(`No bank configuration matches file ${file}`, { additionalContext: { file } });
  }
}

/**
 * None of a bank's column layouts fits the file header.
 * `missingColumns` lists, per variant, the required columns that were absent.
 */
export class SchemaMismatchError extends DomainError {
  readonly code = 'SCHEMA_MISMATCH';
  readonly severity = 'error' as const;

  constructor(
    public readonly file: string,
    public readonly bank: string,
    public readonly missingColumns: Record<string, string[]>
  ) {
    const detail = Object.entries(missingColumns)
      .map(([variant, columns]) => `${variant}: missing ${columns.join(', ')}`)
      .join('; ');
    super(`No ${bank} column layout matches ${file} (${detail})`, {
      additionalContext: { bank, file, missingColumns },
    });
  }
}

export interface ParseErrorLocation {
  column?: string | undefined;
  file?: string | undefined;
  row?: number | undefined;
  value?: unknown;
}

/**
 * A row or cell that could not be normalized. `row` is the 1-based line of
 * the source file (header rows included).
 */
export class ParseError extends DomainError {
  readonly code = 'PARSE_ERROR';
  readonly severity = 'warning' as const;

  readonly column?: string | undefined;
  readonly file?: string | undefined;
  readonly row?: number | undefined;
  readonly value?: unknown;

  constructor(message: string, location: ParseErrorLocation = {}) {
    super(message, { additionalContext: { ...location } });
    this.column = location.column;
    this.file = location.file;
    this.row = location.row;
    this.value = location.value;
  }

  /**
   * Copy of this error with the file/row filled in, for errors raised by
   * cell-level parsers that do not know where they are.
   */
  at(location: ParseErrorLocation): ParseError {
    return new ParseError(this.message, {
      column: location.column ?? this.column,
      file: location.file ?? this.file,
      row: location.row ?? this.row,
      value: this.value,
    });
  }
}

/**
 * Rejected input to a mutation. Carries the exact offending value.
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly value: unknown,
    public readonly field?: string | undefined
  ) {
    super(message, { additionalContext: { field, value } });
  }
}

export class NotFoundError extends DomainError {
  readonly code: string = 'NOT_FOUND';
  readonly severity = 'error' as const;
}

/**
 * No expected rate exists for a bank/installment pair. Distinct from a rate
 * mismatch: there is no policy to violate.
 */
export class RateUndefinedError extends NotFoundError {
  override readonly code = 'RATE_UNDEFINED';

  constructor(
    public readonly bank: string,
    public readonly installmentCount: number
  ) {
    super(`No expected rate for ${bank} with ${installmentCount} installment(s)`, {
      additionalContext: { bank, installmentCount },
    });
  }
}

/**
 * A rate document that cannot be imported. Nothing was changed.
 */
export class RateImportError extends DomainError {
  readonly code = 'RATE_IMPORT_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message, {
      additionalContext: { issues },
    });
  }
}

export class ConfigurationError extends DomainError {
  readonly code = 'CONFIG_ERROR';
  readonly severity = 'error' as const;
}
