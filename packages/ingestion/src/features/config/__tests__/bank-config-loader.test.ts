import { describe, expect, it } from 'vitest';

import { SHIPPED_BANKS_PATH } from '../../../__tests__/test-utils/shipped-config.js';
import { loadBankConfigs, parseBanksDocument } from '../bank-config-loader.js';

const minimalBank = `
  - id: testbank
    displayName: Test Bank
    filePattern: testbank
    classifier: { kind: sign }
    columns:
      - { source: Tarih, target: transactionDate }
      - { source: Tutar, target: grossAmount }
`;

describe('loadBankConfigs', () => {
  it('should load the shipped configuration in declaration order', async () => {
    const configs = (await loadBankConfigs(SHIPPED_BANKS_PATH))._unsafeUnwrap();

    expect(configs.map((config) => config.id)).toEqual([
      'vakifbank',
      'akbank',
      'garanti',
      'halkbank',
      'isbank',
      'qnb',
      'ykb',
      'ziraat',
    ]);
    expect(configs.find((config) => config.id === 'akbank')?.variants.map((variant) => variant.name)).toEqual(['current', 'legacy']);
    expect(configs.find((config) => config.id === 'garanti')?.variants.map((variant) => variant.name)).toEqual(['default']);
  });

  it('should fail when the file is missing', async () => {
    const result = await loadBankConfigs('/nonexistent/banks.yaml');

    expect(result._unsafeUnwrapErr().message).toMatch(/^Cannot read bank configuration \/nonexistent\/banks\.yaml: /);
  });
});

describe('parseBanksDocument', () => {
  it('should apply defaults', () => {
    const [config] = parseBanksDocument(`banks:${minimalBank}`)._unsafeUnwrap();

    expect(config).toMatchObject({
      dateFormat: 'auto',
      delimiter: ',',
      encoding: 'utf-8',
      excludedTypes: [],
      numberFormat: 'auto',
      rateScale: 'auto',
      skipRows: 0,
    });
    expect(config?.variants[0]?.columns[0]).toEqual({ required: true, source: 'Tarih', target: 'transactionDate' });
  });

  it('should list every validation issue', () => {
    const result = parseBanksDocument(`banks:${minimalBank.replace('id: testbank', 'id: Test Bank')}`);

    expect(result._unsafeUnwrapErr().message).toBe(
      'Invalid bank configuration in banks.yaml:\n  - banks.0.id: Bank id must be lower-case letters, digits or underscores'
    );
  });

  it('should reject duplicate bank ids', () => {
    const result = parseBanksDocument(`banks:${minimalBank}${minimalBank}`, 'custom.yaml');

    expect(result._unsafeUnwrapErr().message).toBe('Invalid bank configuration in custom.yaml:\n  - banks: Bank ids must be unique');
  });

  it('should reject malformed YAML', () => {
    expect(parseBanksDocument('banks: [')._unsafeUnwrapErr().message).toMatch(/^Invalid YAML in banks\.yaml: /);
  });
});
