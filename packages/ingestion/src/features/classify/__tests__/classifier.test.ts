import type { ClassifierRule } from '@posledger/core';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { classify } from '../classifier.js';

describe('classify', () => {
  describe('description rule', () => {
    const rule: ClassifierRule = { fields: ['description', 'transactionType'], kind: 'description', markers: ['iade'] };

    it('should mark a row with the refund marker as refund', () => {
      expect(classify({ description: 'SATIS IADESI' }, rule)).toBe('refund');
    });

    it('should match the marker regardless of Turkish case', () => {
      expect(classify({ transactionType: 'İADE' }, rule)).toBe('refund');
    });

    it('should default to sale', () => {
      expect(classify({ description: 'Satış' }, rule)).toBe('sale');
      expect(classify({}, rule)).toBe('sale');
    });
  });

  describe('flag rule', () => {
    const rule: ClassifierRule = { field: 'refundFlag', kind: 'flag', refundValues: ['E', 'Evet'] };

    it('should compare the flag with the refund values', () => {
      expect(classify({ refundFlag: 'evet' }, rule)).toBe('refund');
      expect(classify({ refundFlag: 'H' }, rule)).toBe('sale');
      expect(classify({}, rule)).toBe('sale');
    });
  });

  describe('sign rule', () => {
    it('should treat a negative gross amount as refund', () => {
      expect(classify({ grossAmount: new Decimal('-12.50') }, { kind: 'sign' })).toBe('refund');
      expect(classify({ grossAmount: new Decimal('12.50') }, { kind: 'sign' })).toBe('sale');
      expect(classify({}, { kind: 'sign' })).toBe('sale');
    });
  });
});
