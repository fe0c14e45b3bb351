import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { normalizeRate, parseAmount, parseInstallment, parseInteger } from '../number-parser.js';

describe('parseAmount', () => {
  describe('signed-fixed', () => {
    it('should normalize a zero-padded positive literal', () => {
      const value = parseAmount('+00000000000005038.80', 'signed-fixed')._unsafeUnwrap();

      expect(value.equals(new Decimal('5038.80'))).toBe(true);
      expect(value.toFixed(2)).toBe('5038.80');
    });

    it('should keep the sign of a negative literal', () => {
      expect(parseAmount('-00000000000000012.50', 'signed-fixed')._unsafeUnwrap().toString()).toBe('-12.5');
    });

    it('should read an all-zero literal as zero', () => {
      expect(parseAmount('+0000000000000.00', 'signed-fixed')._unsafeUnwrap().isZero()).toBe(true);
    });

    it('should reject non-numeric text', () => {
      const result = parseAmount('+000000ABC.00', 'signed-fixed');

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().message).toBe('Unparseable signed-fixed number "+000000ABC.00"');
      expect(result._unsafeUnwrapErr().value).toBe('+000000ABC.00');
    });
  });

  describe('tr', () => {
    it('should treat dots as thousands and the comma as decimal mark', () => {
      expect(parseAmount('1.234,56', 'tr')._unsafeUnwrap().toString()).toBe('1234.56');
    });

    it('should strip currency markers and spaces', () => {
      expect(parseAmount('₺ 1.250,00 TL', 'tr')._unsafeUnwrap().toString()).toBe('1250');
    });

    it('should read accounting parentheses as negative', () => {
      expect(parseAmount('(12,50)', 'tr')._unsafeUnwrap().toString()).toBe('-12.5');
    });

    it('should reject a literal with letters', () => {
      expect(parseAmount('12a', 'tr')._unsafeUnwrapErr().message).toBe('Unparseable tr number "12a"');
    });
  });

  describe('en', () => {
    it('should treat commas as thousands separators', () => {
      expect(parseAmount('1,234.56', 'en')._unsafeUnwrap().toString()).toBe('1234.56');
    });
  });

  describe('auto', () => {
    it.each([
      ['1.234,56', '1234.56'],
      ['1,234.56', '1234.56'],
      ['12,5', '12.5'],
      ['1.234.567', '1234567'],
      ['1,234,567', '1234567'],
      ['5038.80', '5038.8'],
      ['+42', '42'],
    ])('should read %s as %s', (input, expected) => {
      expect(parseAmount(input, 'auto')._unsafeUnwrap().toString()).toBe(expected);
    });
  });

  it('should take spreadsheet numbers as they are', () => {
    expect(parseAmount(5038.8, 'tr')._unsafeUnwrap().toString()).toBe('5038.8');
  });

  it('should reject empty and boolean cells', () => {
    expect(parseAmount('  ', 'auto').isErr()).toBe(true);
    expect(parseAmount(true, 'auto').isErr()).toBe(true);
  });
});

describe('normalizeRate', () => {
  it('should divide percentages above one in auto mode', () => {
    expect(normalizeRate(new Decimal('3.36'), 'auto').toString()).toBe('0.0336');
  });

  it('should keep fractions in auto mode', () => {
    expect(normalizeRate(new Decimal('0.0336'), 'auto').toString()).toBe('0.0336');
  });

  it('should always divide in percent mode', () => {
    expect(normalizeRate(new Decimal('0.5'), 'percent').toString()).toBe('0.005');
  });

  it('should return the magnitude', () => {
    expect(normalizeRate(new Decimal('-0.0295'), 'fraction').toString()).toBe('0.0295');
  });
});

describe('parseInstallment', () => {
  it('should read a plain count', () => {
    expect(parseInstallment('3')._unsafeUnwrap()).toEqual({ count: 3 });
    expect(parseInstallment(6)._unsafeUnwrap()).toEqual({ count: 6 });
  });

  it('should read count/number pairs', () => {
    expect(parseInstallment('6/2')._unsafeUnwrap()).toEqual({ count: 6, index: 2 });
  });

  it('should treat zero, blank and single-payment words as one', () => {
    expect(parseInstallment(0)._unsafeUnwrap()).toEqual({ count: 1 });
    expect(parseInstallment('')._unsafeUnwrap()).toEqual({ count: 1 });
    expect(parseInstallment('00')._unsafeUnwrap()).toEqual({ count: 1 });
    expect(parseInstallment('Peşin')._unsafeUnwrap()).toEqual({ count: 1 });
  });

  it('should reject a number past the count', () => {
    expect(parseInstallment('2/6')._unsafeUnwrapErr().message).toBe('Installment number 6 exceeds count 2');
  });

  it('should reject free text', () => {
    expect(parseInstallment('many').isErr()).toBe(true);
  });
});

describe('parseInteger', () => {
  it('should accept integral strings and numbers', () => {
    expect(parseInteger('4')._unsafeUnwrap()).toBe(4);
    expect(parseInteger('4,00')._unsafeUnwrap()).toBe(4);
    expect(parseInteger(7)._unsafeUnwrap()).toBe(7);
  });

  it('should reject fractions', () => {
    expect(parseInteger('4.5').isErr()).toBe(true);
  });
});
