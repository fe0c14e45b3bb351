import * as p from '@clack/prompts';
import { setLoggerTransports } from '@posledger/logger';
import type { MockInstance } from 'vitest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExitCodes } from '../exit-codes.js';
import { OutputManager } from '../output.js';

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  log: {
    error: vi.fn(),
    info: vi.fn(),
    message: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
  },
  note: vi.fn(),
  outro: vi.fn(),
  spinner: vi.fn(() => ({ message: vi.fn(), start: vi.fn(), stop: vi.fn() })),
}));

vi.mock('@posledger/logger', () => ({
  getLogger: vi.fn(() => ({ debug: vi.fn(), error: vi.fn(), info: vi.fn(), warn: vi.fn() })),
  setLoggerTransports: vi.fn(),
}));

describe('OutputManager', () => {
  let stdoutSpy: MockInstance<typeof process.stdout.write>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    vi.clearAllMocks();

    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.useRealTimers();
    stdoutSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  function writtenJson(): unknown {
    const [chunk] = stdoutSpy.mock.calls[0] ?? [];
    return typeof chunk === 'string' ? JSON.parse(chunk) : undefined;
  }

  it('should silence console logging in JSON mode', () => {
    new OutputManager('json');

    expect(setLoggerTransports).toHaveBeenCalledWith({ console: false });
  });

  it('should leave logging alone in text mode', () => {
    new OutputManager('text');

    expect(setLoggerTransports).not.toHaveBeenCalled();
  });

  it('should write a success envelope in JSON mode', () => {
    new OutputManager('json').json('rates lookup', { rate: '0.0336' });

    expect(writtenJson()).toEqual({
      command: 'rates lookup',
      data: { rate: '0.0336' },
      metadata: { duration_ms: 0 },
      success: true,
      timestamp: '2024-01-01T00:00:00.000Z',
    });
  });

  it('should not write JSON in text mode', () => {
    const output = new OutputManager('text');

    output.json('rates lookup', { rate: '0.0336' });
    output.intro('posledger rates');

    expect(stdoutSpy).not.toHaveBeenCalled();
    expect(p.intro).toHaveBeenCalledTimes(1);
  });

  it('should print an error envelope and exit with its code in JSON mode', () => {
    const output = new OutputManager('json');

    expect(() => output.error('rates set', new Error('Unknown bank "x"'), ExitCodes.NOT_FOUND)).toThrow('process.exit called');

    expect(writtenJson()).toEqual({
      command: 'rates set',
      error: { code: 'NOT_FOUND', message: 'Unknown bank "x"' },
      success: false,
      timestamp: '2024-01-01T00:00:00.000Z',
    });
    expect(processExitSpy).toHaveBeenCalledWith(4);
  });

  it('should show the error and a tip in text mode', () => {
    const output = new OutputManager('text');

    expect(() => output.error('rates lookup', new Error('Unknown bank "x"'), ExitCodes.NOT_FOUND)).toThrow('process.exit called');

    expect(p.log.error).toHaveBeenCalledTimes(1);
    expect(p.note).toHaveBeenCalledWith('Run `posledger rates list` to see the known banks and installment counts.', 'Tip');
  });

  it('should have no spinner in JSON mode', () => {
    expect(new OutputManager('json').spinner()).toBeUndefined();
  });
});
