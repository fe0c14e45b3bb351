import type { MockInstance } from 'vitest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { confirmUnlessSkipped, parseCommandOptions } from '../command-execution.js';
import { ReconcileCommandOptionsSchema } from '../schemas.js';
import { OutputManager } from '../output.js';
import { confirmOrCancel } from '../prompts.js';

vi.mock('../prompts.js', () => ({
  confirmOrCancel: vi.fn(),
}));

vi.mock('@posledger/logger', () => ({
  getLogger: vi.fn(() => ({ debug: vi.fn(), error: vi.fn(), info: vi.fn(), warn: vi.fn() })),
  setLoggerTransports: vi.fn(),
}));

describe('command-execution', () => {
  describe('confirmUnlessSkipped', () => {
    beforeEach(() => {
      vi.clearAllMocks();
    });

    it('should not prompt when --yes was given', async () => {
      await confirmUnlessSkipped({ cancelMessage: 'Cancelled', message: 'Apply?', output: new OutputManager('text'), skip: true });

      expect(confirmOrCancel).not.toHaveBeenCalled();
    });

    it('should not prompt in JSON mode', async () => {
      await confirmUnlessSkipped({ cancelMessage: 'Cancelled', message: 'Apply?', output: new OutputManager('json'), skip: false });

      expect(confirmOrCancel).not.toHaveBeenCalled();
    });

    it('should ask with the cancel message otherwise', async () => {
      vi.mocked(confirmOrCancel).mockResolvedValue(undefined);

      await confirmUnlessSkipped({ cancelMessage: 'Cancelled', message: 'Apply?', output: new OutputManager('text'), skip: false });

      expect(confirmOrCancel).toHaveBeenCalledWith('Apply?', 'Cancelled');
    });
  });

  describe('parseCommandOptions', () => {
    let stdoutSpy: MockInstance<typeof process.stdout.write>;
    let processExitSpy: MockInstance<typeof process.exit>;

    beforeEach(() => {
      stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      });
    });

    afterEach(() => {
      stdoutSpy.mockRestore();
      processExitSpy.mockRestore();
    });

    it('should return parsed options and a matching output manager', () => {
      const { options, output } = parseCommandOptions('reconcile', ReconcileCommandOptionsSchema, {
        groupBy: 'bank, installment',
        json: true,
      });

      expect(options.groupBy).toEqual(['bank', 'installment']);
      expect(output.isJsonMode()).toBe(true);
    });

    it('should exit with INVALID_ARGS on the first issue', () => {
      expect(() => parseCommandOptions('reconcile', ReconcileCommandOptionsSchema, { groupBy: 'bank,week', json: true })).toThrow(
        'process.exit called'
      );

      expect(processExitSpy).toHaveBeenCalledWith(2);
      const [chunk] = stdoutSpy.mock.calls[0] ?? [];
      expect(JSON.parse(String(chunk))).toMatchObject({ command: 'reconcile', success: false });
    });
  });
});
