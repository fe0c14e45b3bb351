import path from 'node:path';

import { UnknownSourceError } from '@posledger/core';
import { defaultSettings } from '@posledger/env';
import type { FileReport } from '@posledger/ingestion';
import type { SummaryRecord } from '@posledger/reconciliation';
import { describe, expect, it } from 'vitest';

import {
  buildReconcileParams,
  fileReportRecord,
  formatControl,
  formatFileReports,
  formatSummaryTable,
} from '../reconcile-utils.js';

function createFileReport(overrides: Partial<FileReport> = {}): FileReport {
  return {
    bank: 'vakifbank',
    file: '/data/march/vakifbank_2024-03.csv',
    filteredCount: 0,
    rowCount: 3,
    skipped: [],
    status: 'ok',
    transactions: [],
    ...overrides,
  };
}

const SUMMARY: SummaryRecord = {
  bank: 'vakifbank',
  period: '2024-03',
  installment: 1,
  transactionCount: 2,
  matchedCount: 1,
  mismatchedCount: 1,
  rateUndefinedCount: 0,
  totalGross: '6038.80',
  totalCommission: '209.30',
  totalNet: '5829.50',
  totalBlocked: '0.00',
  totalCommissionExpected: '202.90',
  totalCommissionDiff: '6.40',
  commissionPercentage: '3.47',
  matchPercentage: '50.00',
};

describe('reconcile-utils', () => {
  describe('buildReconcileParams', () => {
    it('should fall back to settings and the data directory', () => {
      const params = buildReconcileParams(undefined, {}, defaultSettings(), '/srv/posledger/data');

      expect(params.dir).toBe(path.resolve('/srv/posledger/data'));
      expect(params.groupBy).toEqual(['bank', 'period', 'installment']);
      expect(params.periodGranularity).toBe('month');
      expect(params.tolerance.toString()).toBe('0.01');
    });

    it('should let flags override settings', () => {
      const params = buildReconcileParams('/data/march', { groupBy: ['bank'], period: 'year' }, defaultSettings(), '/srv/data');

      expect(params.dir).toBe(path.resolve('/data/march'));
      expect(params.groupBy).toEqual(['bank']);
      expect(params.periodGranularity).toBe('year');
    });
  });

  describe('fileReportRecord', () => {
    it('should carry the error code of a failed file', () => {
      const record = fileReportRecord(
        createFileReport({
          bank: undefined,
          error: new UnknownSourceError('/data/march/notes.csv'),
          file: '/data/march/notes.csv',
          rowCount: 0,
          status: 'failed',
        })
      );

      expect(record).toEqual({
        bank: undefined,
        error: { code: 'UNKNOWN_SOURCE', message: 'No bank configuration matches file /data/march/notes.csv' },
        file: '/data/march/notes.csv',
        filteredCount: 0,
        rowCount: 0,
        skippedCount: 0,
        status: 'failed',
        transactionCount: 0,
      });
    });

    it('should use a generic code for other errors', () => {
      const record = fileReportRecord(createFileReport({ error: new Error('EACCES'), status: 'failed' }));

      expect(record.error).toEqual({ code: 'ERROR', message: 'EACCES' });
    });
  });

  describe('formatFileReports', () => {
    it('should print one line per file relative to the directory', () => {
      const lines = formatFileReports(
        [
          fileReportRecord(createFileReport({ filteredCount: 2 })),
          fileReportRecord(
            createFileReport({ error: new UnknownSourceError('/data/march/notes.csv'), file: '/data/march/notes.csv', status: 'failed' })
          ),
        ],
        '/data/march'
      );

      expect(lines).toEqual([
        '✓ vakifbank_2024-03.csv [vakifbank]: 0 transactions (2 filtered)',
        '✗ notes.csv: UNKNOWN_SOURCE No bank configuration matches file /data/march/notes.csv',
      ]);
    });
  });

  describe('formatSummaryTable', () => {
    it('should render one row per summary with * for keys not grouped on', () => {
      const lines = formatSummaryTable([SUMMARY, { ...SUMMARY, bank: undefined, installment: undefined, period: undefined }]);

      expect(lines).toHaveLength(4);
      expect(lines[0]).toBe(
        'BANK       PERIOD   INST  TXNS    GROSS  COMMISSION      NET  RATE %  MISMATCH  UNDEFINED  MATCH %'
      );
      expect(lines[2]).toBe(
        'vakifbank  2024-03     1     2  6038.80      209.30  5829.50    3.47         1          0    50.00'
      );
      expect(lines[3]).toBe(
        '*          *           *     2  6038.80      209.30  5829.50    3.47         1          0    50.00'
      );
    });
  });

  it('should format the control totals', () => {
    const text = formatControl({
      commissionPercentage: '3.47',
      matchedCount: 1,
      matchPercentage: '50.00',
      mismatchedCount: 1,
      rateUndefinedCount: 0,
      totalBlocked: '0.00',
      totalCommission: '209.30',
      totalCommissionDiff: '6.40',
      totalCommissionExpected: '202.90',
      totalGross: '6038.80',
      totalNet: '5829.50',
      transactionCount: 2,
    });

    expect(text.split('\n')).toEqual([
      'Transactions: 2 (1 matched, 1 mismatched, 0 without rate)',
      'Match rate:   50.00%',
      'Gross:        6038.80',
      'Commission:   209.30 (expected 202.90, diff 6.40)',
      'Net:          5829.50',
    ]);
  });
});
