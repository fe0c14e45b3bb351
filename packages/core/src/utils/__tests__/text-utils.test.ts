import { describe, expect, it } from 'vitest';

import { containsNormalized, normalizeText } from '../text-utils.js';

describe('normalizeText', () => {
  it('should fold Turkish letters and case', () => {
    expect(normalizeText('İŞLEM TARİHİ')).toBe('islem tarihi');
    expect(normalizeText('Katkı Payı TL')).toBe('katki payi tl');
    expect(normalizeText('Vakıfbank')).toBe('vakifbank');
  });

  it('should collapse separators and whitespace', () => {
    expect(normalizeText('PROVIZYON_TUTAR')).toBe('provizyon tutar');
    expect(normalizeText('  Komisyon /  Oran  ')).toBe('komisyon oran');
    expect(normalizeText('Net Tutar')).toBe('net tutar');
  });

  it('should strip a byte order mark', () => {
    expect(normalizeText('\uFEFFIslem Tarihi')).toBe('islem tarihi');
  });
});

describe('containsNormalized', () => {
  it('should find a marker regardless of case and diacritics', () => {
    expect(containsNormalized('SATIŞ İADE', 'iade')).toBe(true);
    expect(containsNormalized('Satış', 'iade')).toBe(false);
  });

  it('should never match an empty needle', () => {
    expect(containsNormalized('anything', '  ')).toBe(false);
  });
});
