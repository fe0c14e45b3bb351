import { describe, expect, it } from 'vitest';

import { computeColumnWidth, renderTable } from '../table-utils.js';

describe('table-utils', () => {
  it('should size a column to its widest value', () => {
    expect(computeColumnWidth(['a', 'abcd', 'ab'], (value) => value, 2)).toBe(4);
    expect(computeColumnWidth([], (value: string) => value, 3)).toBe(3);
  });

  it('should render header, rule and aligned rows', () => {
    const rows = [
      { bank: 'akbank', rate: '0.036000' },
      { bank: 'vakifbank', rate: '0.0336' },
    ];

    const lines = renderTable(rows, [
      { header: 'BANK', format: (row) => row.bank },
      { align: 'right', header: 'RATE', format: (row) => row.rate },
    ]);

    expect(lines).toEqual([
      'BANK           RATE',
      '---------  --------',
      'akbank     0.036000',
      'vakifbank    0.0336',
    ]);
  });
});
