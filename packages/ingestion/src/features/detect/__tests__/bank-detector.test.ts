import { UnknownSourceError } from '@posledger/core';
import { describe, expect, it } from 'vitest';

import { createBankConfig } from '../../../__tests__/test-utils/bank-fixtures.js';
import { detectBankByFilename, detectBankByHeader, headerOverlap } from '../bank-detector.js';

const testbank = createBankConfig();
const otherbank = createBankConfig({
  columns: [
    { source: 'TARIH', target: 'transactionDate' },
    { source: 'TUTAR', target: 'grossAmount' },
    { source: 'KOMISYON', target: 'commissionAmount' },
  ],
  filePattern: 'other[ _-]?bank|diger',
  id: 'otherbank',
});
const configs = [testbank, otherbank];

describe('detectBankByFilename', () => {
  it('should match the pattern against the file name only', () => {
    expect(detectBankByFilename('/data/testbank/Other_Bank_2024-03.csv', configs)._unsafeUnwrap().id).toBe('otherbank');
  });

  it('should try configurations in declaration order', () => {
    expect(detectBankByFilename('/data/testbank-otherbank.csv', configs)._unsafeUnwrap().id).toBe('testbank');
  });

  it('should also match the diacritic-folded name', () => {
    expect(detectBankByFilename('/data/DİĞER ekstre.xlsx', configs)._unsafeUnwrap().id).toBe('otherbank');
  });

  it('should fail with UnknownSourceError when nothing matches', () => {
    const error = detectBankByFilename('/data/statement.csv', configs)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(UnknownSourceError);
    expect(error.message).toBe('No bank configuration matches file /data/statement.csv');
  });
});

describe('headerOverlap', () => {
  it('should return the share of required columns present', () => {
    expect(headerOverlap(['İşlem Tarihi', 'Tutar', 'Açıklama'], testbank)).toBeCloseTo(2 / 3);
    expect(headerOverlap(['islem_tarihi', 'TUTAR', 'KOMISYON'], testbank)).toBe(1);
  });
});

describe('detectBankByHeader', () => {
  it('should pick the configuration with the best overlap', () => {
    const result = detectBankByHeader('/data/x.csv', () => ['TARIH', 'TUTAR', 'KOMISYON', 'ACIKLAMA'], configs);

    expect(result._unsafeUnwrap().id).toBe('otherbank');
  });

  it('should ignore overlaps below the threshold', () => {
    const result = detectBankByHeader('/data/x.csv', () => ['TUTAR', 'ACIKLAMA'], configs);

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(UnknownSourceError);
  });

  it('should skip configurations that cannot read the file', () => {
    const result = detectBankByHeader(
      '/data/x.csv',
      (config) => (config.id === 'testbank' ? undefined : ['TARIH', 'TUTAR', 'KOMISYON']),
      configs
    );

    expect(result._unsafeUnwrap().id).toBe('otherbank');
  });
});
