import { RateImportError } from '@posledger/core';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { RateTable } from '../../table/rate-table.js';
import { parseRateDocument, rateFormatFromPath, serializeRateTable } from '../rate-document-codec.js';
import type { RateDocumentFormat } from '../rate-document.schemas.js';

const YAML_DOCUMENT = `
version: 2
banks:
  vakifbank:
    name: T. VAKIFLAR BANKASI T.A.O.
    aliases: [Vakıfbank, VakıfBank]
    rates:
      1: 0.0336
      2: 0.0499
  garanti:
    name: Garanti, BBVA
    rates:
      1: "0.0349"
`;

function describeTable(table: RateTable) {
  return table.banks.map((bank) => ({
    aliases: [...bank.aliases],
    id: bank.id,
    name: bank.name,
    rates: [...bank.rates].map(([installment, rate]) => [installment, rate.toString()]),
  }));
}

describe('parseRateDocument', () => {
  it('should read a YAML document', () => {
    const table = parseRateDocument(YAML_DOCUMENT, 'yaml')._unsafeUnwrap();

    expect(table.version).toBe(2);
    expect(describeTable(table)).toEqual([
      { aliases: [], id: 'garanti', name: 'Garanti, BBVA', rates: [[1, '0.0349']] },
      {
        aliases: ['Vakıfbank', 'VakıfBank'],
        id: 'vakifbank',
        name: 'T. VAKIFLAR BANKASI T.A.O.',
        rates: [
          [1, '0.0336'],
          [2, '0.0499'],
        ],
      },
    ]);
  });

  it('should reject rates outside [0, 1)', () => {
    const result = parseRateDocument(YAML_DOCUMENT.replace('2: 0.0499', '2: 1.5'), 'yaml');

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(RateImportError);
    expect(error.issues).toEqual(['banks.vakifbank.rates.2: Rate must be at least 0 and below 1']);
  });

  it('should reject aliases containing the csv alias separator', () => {
    const result = parseRateDocument(YAML_DOCUMENT.replace('[Vakıfbank, VakıfBank]', '[Vakıfbank, "A|B"]'), 'yaml');

    expect(result._unsafeUnwrapErr().issues).toEqual(['banks.vakifbank.aliases.1: Alias must not contain "|"']);
  });

  it('should reject non-numeric rates', () => {
    const content = YAML_DOCUMENT.replace('2: 0.0499', '2: abc');

    expect(parseRateDocument(content, 'yaml')._unsafeUnwrapErr().issues).toEqual([
      'banks.vakifbank.rates.2: Must be a valid decimal number',
    ]);
  });

  it('should reject installment count 0', () => {
    const content = YAML_DOCUMENT.replace('1: "0.0349"', '0: "0.0349"');

    expect(parseRateDocument(content, 'yaml')._unsafeUnwrapErr().issues).toEqual([
      'banks.garanti.rates.0: Installment count must be at least 1',
    ]);
  });

  it('should reject malformed JSON', () => {
    expect(parseRateDocument('{"banks":', 'json')._unsafeUnwrapErr().message).toMatch(/^Malformed rate json: /);
  });

  it('should group csv rows by bank and merge aliases', () => {
    const csv = [
      'bank_key,bank_name,installment,rate,aliases',
      'vakifbank,T. VAKIFLAR BANKASI T.A.O.,1,0.0336,Vakıfbank',
      'vakifbank,T. VAKIFLAR BANKASI T.A.O.,2,0.0499,Vakıfbank|VakıfBank',
      '',
    ].join('\n');

    const table = parseRateDocument(csv, 'csv')._unsafeUnwrap();

    expect(describeTable(table)).toEqual([
      {
        aliases: ['Vakıfbank', 'VakıfBank'],
        id: 'vakifbank',
        name: 'T. VAKIFLAR BANKASI T.A.O.',
        rates: [
          [1, '0.0336'],
          [2, '0.0499'],
        ],
      },
    ]);
  });

  it('should report csv issues by file line', () => {
    const csv = ['bank_key,bank_name,installment,rate,aliases', 'ziraat,Ziraat,1,0.0295,', 'ziraat,Ziraat,1,0.03,'].join('\n');

    expect(parseRateDocument(csv, 'csv')._unsafeUnwrapErr().issues).toEqual(['line 3: duplicate rate for ziraat installment 1']);
    expect(parseRateDocument('bank_key,bank_name,installment,rate\nziraat,Ziraat,1,-0.01\n', 'csv')._unsafeUnwrapErr().issues).toEqual([
      'line 2 rate: Rate must be at least 0 and below 1',
    ]);
  });
});

describe('serializeRateTable', () => {
  const table = new RateTable(
    [
      {
        aliases: ['Garanti', 'Garanti "BBVA"'],
        id: 'garanti',
        name: 'Garanti, BBVA',
        rates: new Map([[1, new Decimal('0.0349')]]),
      },
      {
        aliases: ['Vakıfbank'],
        id: 'vakifbank',
        name: 'T. VAKIFLAR BANKASI T.A.O.',
        rates: new Map([
          [1, new Decimal('0.0336')],
          [3, new Decimal('0.069')],
        ]),
      },
    ],
    4
  );

  it('should write csv with quoted fields where needed', () => {
    expect(serializeRateTable(table, 'csv')).toBe(
      [
        'bank_key,bank_name,installment,rate,aliases',
        'garanti,"Garanti, BBVA",1,0.0349,"Garanti|Garanti ""BBVA"""',
        'vakifbank,T. VAKIFLAR BANKASI T.A.O.,1,0.0336,Vakıfbank',
        'vakifbank,T. VAKIFLAR BANKASI T.A.O.,3,0.069,Vakıfbank',
        '',
      ].join('\n')
    );
  });

  it('should write integer installment keys in YAML', () => {
    const yaml = serializeRateTable(table, 'yaml');

    expect(yaml.startsWith('version: 4\n')).toBe(true);
    expect(yaml).toMatch(/\n {6}1: (["'])0\.0336\1\n {6}3: (["'])0\.069\2\n/);
  });

  it('should write rates as decimal strings in JSON', () => {
    const json: unknown = JSON.parse(serializeRateTable(table, 'json'));

    expect(json).toMatchObject({ banks: { vakifbank: { rates: { '1': '0.0336', '3': '0.069' } } }, version: 4 });
  });

  it.each<RateDocumentFormat>(['yaml', 'json', 'csv'])('should keep rates beyond double precision in %s output', (format) => {
    const precise = new RateTable(
      [{ aliases: [], id: 'vakifbank', name: 'Vakıfbank', rates: new Map([[1, new Decimal('0.033612345678901234567')]]) }],
      1
    );

    const restored = parseRateDocument(serializeRateTable(precise, format), format)._unsafeUnwrap();

    expect(restored.lookup('vakifbank', 1)._unsafeUnwrap().toFixed()).toBe('0.033612345678901234567');
  });

  it.each<RateDocumentFormat>(['yaml', 'json', 'csv'])('should read back its own %s output with aliases intact', (format) => {
    const restored = parseRateDocument(serializeRateTable(table, format), format)._unsafeUnwrap();

    expect(describeTable(restored)).toEqual(describeTable(table));
  });
});

describe('rateFormatFromPath', () => {
  it('should map extensions to formats', () => {
    expect(rateFormatFromPath('/x/rates.YML')).toBe('yaml');
    expect(rateFormatFromPath('rates.json')).toBe('json');
    expect(rateFormatFromPath('rates.csv')).toBe('csv');
    expect(rateFormatFromPath('rates.xlsx')).toBeUndefined();
  });
});
