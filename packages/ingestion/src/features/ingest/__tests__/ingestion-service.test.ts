import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { SchemaMismatchError, UnknownSourceError } from '@posledger/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { shippedBankConfigs } from '../../../__tests__/test-utils/shipped-config.js';
import { registerAllBanks } from '../../../sources/banks/index.js';
import { clearSourceAdapters } from '../../../shared/types/source-adapter.js';
import { IngestionService } from '../ingestion-service.js';

const VAKIFBANK_CSV = [
  'ISLEM TARIHI;ISLEM TUTARI;KOMISYON TUTARI;TAKSIT SAYISI;ISLEM TIPI;ISLEM ACIKLAMA',
  '01/03/2024;+00000000000005038.80;+00000000000000169.30;01;TEK;SATIS',
  '02/03/2024;-00000000000000100.00;-00000000000000003.36;01;TEK;IADE',
  '',
].join('\n');

const GARANTI_CSV = ['İşlem Tarihi,Tutar,Komisyon', '01.03.2024,"100,00","2,50"', ''].join('\n');

describe('IngestionService', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'posledger-ingest-'));
    registerAllBanks();
  });

  afterEach(async () => {
    clearSourceAdapters();
    await fs.rm(tempDir, { force: true, recursive: true });
  });

  function service(rowErrorPolicy: 'skip' | 'abort' = 'skip'): IngestionService {
    return new IngestionService(shippedBankConfigs(), { concurrency: 2, rowErrorPolicy });
  }

  it('should keep good files when another file fails', async () => {
    await fs.writeFile(path.join(tempDir, 'vakifbank_2024-03.csv'), VAKIFBANK_CSV, 'latin1');
    await fs.writeFile(path.join(tempDir, 'garanti_2024-03.csv'), 'Foo,Bar\n1,2\n');

    const reports = (await service().ingestDirectory(tempDir))._unsafeUnwrap();

    expect(reports.map((report) => [path.basename(report.file), report.status])).toEqual([
      ['garanti_2024-03.csv', 'failed'],
      ['vakifbank_2024-03.csv', 'ok'],
    ]);

    const [garanti, vakifbank] = reports;
    expect(garanti?.bank).toBe('garanti');
    expect(garanti?.error).toBeInstanceOf(SchemaMismatchError);
    expect(garanti?.transactions).toEqual([]);
    expect(vakifbank?.transactions.map((tx) => [tx.category, tx.grossAmount.toFixed(2)])).toEqual([
      ['sale', '5038.80'],
      ['refund', '100.00'],
    ]);
  });

  it('should identify a file by its header when the name matches no bank', async () => {
    const file = path.join(tempDir, 'mart_ekstre.csv');
    await fs.writeFile(file, GARANTI_CSV);

    const report = await service().ingestFile(file);

    expect(report.status).toBe('ok');
    expect(report.bank).toBe('garanti');
    expect(report.detectedBy).toBe('header');
    expect(report.transactions[0]?.grossAmount.toString()).toBe('100');
  });

  it('should report unknown sources without failing the batch', async () => {
    const unknown = path.join(tempDir, 'notes.csv');
    const known = path.join(tempDir, 'garanti.csv');
    await fs.writeFile(unknown, 'Tarih,Açıklama\n01.03.2024,kira\n');
    await fs.writeFile(known, GARANTI_CSV);

    const reports = await service().ingestFiles([unknown, known]);

    expect(reports[0]?.error).toBeInstanceOf(UnknownSourceError);
    expect(reports[0]?.bank).toBeUndefined();
    expect(reports[1]?.status).toBe('ok');
    expect(reports[1]?.detectedBy).toBe('filename');
  });

  it('should report unreadable files as failed', async () => {
    const report = await service().ingestFile(path.join(tempDir, 'garanti_missing.csv'));

    expect(report.status).toBe('failed');
    expect(report.error?.message).toMatch(/^Cannot read file: /);
  });

  it('should fail a file on its first bad row under the abort policy', async () => {
    const file = path.join(tempDir, 'garanti.csv');
    await fs.writeFile(file, `${GARANTI_CSV}02.03.2024,abc,"1,00"\n`);

    const skipped = await service('skip').ingestFile(file);
    const aborted = await service('abort').ingestFile(file);

    expect(skipped.status).toBe('ok');
    expect(skipped.skipped.map((row) => row.row)).toEqual([3]);
    expect(aborted.status).toBe('failed');
    expect(aborted.error?.message).toBe('Unparseable tr number "abc"');
  });

  it('should fail when the directory does not exist', async () => {
    const result = await service().ingestDirectory(path.join(tempDir, 'missing'));

    expect(result._unsafeUnwrapErr().message).toMatch(/^Failed to scan /);
  });
});
