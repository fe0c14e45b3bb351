import { ConfigurationError, NotFoundError, RateImportError, RateUndefinedError, ValidationError } from '@posledger/core';
import { describe, expect, it } from 'vitest';

import { ExitCodes, exitCodeForError } from '../exit-codes.js';

describe('exit-codes', () => {
  it('should have unique exit codes', () => {
    const codes = Object.values(ExitCodes);
    expect(new Set(codes).size).toBe(codes.length);
  });

  describe('exitCodeForError', () => {
    it('should map domain errors by their code', () => {
      expect(exitCodeForError(new ValidationError('bad rate', '1.0', 'rate'))).toBe(ExitCodes.VALIDATION_ERROR);
      expect(exitCodeForError(new RateImportError('Invalid rate document'))).toBe(ExitCodes.VALIDATION_ERROR);
      expect(exitCodeForError(new NotFoundError('Unknown bank "x"'))).toBe(ExitCodes.NOT_FOUND);
      expect(exitCodeForError(new RateUndefinedError('akbank', 9))).toBe(ExitCodes.NOT_FOUND);
      expect(exitCodeForError(new ConfigurationError('bad banks.yaml'))).toBe(ExitCodes.CONFIG_ERROR);
    });

    it('should treat other errors as general errors', () => {
      expect(exitCodeForError(new Error('boom'))).toBe(ExitCodes.GENERAL_ERROR);
    });
  });
});
