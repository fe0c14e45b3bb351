import { NotFoundError, RateImportError } from '@posledger/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { errorResponse, exitCodeName, successResponse } from '../cli-response.js';
import { ExitCodes } from '../exit-codes.js';

describe('cli-response', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('successResponse', () => {
    it('should wrap the data', () => {
      expect(successResponse('rates lookup', { rate: '0.0336' })).toEqual({
        success: true,
        command: 'rates lookup',
        timestamp: '2024-01-01T00:00:00.000Z',
        data: { rate: '0.0336' },
      });
    });

    it('should attach metadata only when given', () => {
      expect(successResponse('reconcile', [], { duration_ms: 12 }).metadata).toEqual({ duration_ms: 12 });
      expect(successResponse('reconcile', []).metadata).toBeUndefined();
    });
  });

  describe('errorResponse', () => {
    it('should carry only code and message for plain errors', () => {
      expect(errorResponse('rates set', new Error('disk full'), 'GENERAL_ERROR')).toEqual({
        success: false,
        command: 'rates set',
        timestamp: '2024-01-01T00:00:00.000Z',
        error: { code: 'GENERAL_ERROR', message: 'disk full' },
      });
    });

    it('should add the domain error code and the rejected document issues', () => {
      const error = new RateImportError('Invalid rate document', ['banks.akbank.rates.1: Rate must be at least 0 and below 1']);

      expect(errorResponse('rates import', error, 'VALIDATION_ERROR').error).toEqual({
        code: 'VALIDATION_ERROR',
        issues: ['banks.akbank.rates.1: Rate must be at least 0 and below 1'],
        message: 'Invalid rate document:\n  - banks.akbank.rates.1: Rate must be at least 0 and below 1',
        reason: 'RATE_IMPORT_ERROR',
      });
    });

    it('should not repeat a domain code equal to the exit code name', () => {
      expect(errorResponse('rates lookup', new NotFoundError('Unknown bank "x"'), 'NOT_FOUND').error).toEqual({
        code: 'NOT_FOUND',
        message: 'Unknown bank "x"',
      });
    });
  });

  describe('exitCodeName', () => {
    it('should name exit codes by their key', () => {
      expect(exitCodeName(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
      expect(exitCodeName(ExitCodes.NOT_FOUND)).toBe('NOT_FOUND');
      expect(exitCodeName(ExitCodes.PARTIAL_FAILURE)).toBe('PARTIAL_FAILURE');
      expect(exitCodeName(ExitCodes.CONFIG_ERROR)).toBe('CONFIG_ERROR');
    });
  });
});
