import { registerSourceAdapter } from '../../../shared/types/source-adapter.js';

import { YkbAdapter } from './adapter.js';

export function registerYkb(): void {
  registerSourceAdapter({
    bankId: 'ykb',
    create: (config) => new YkbAdapter(config),
  });
}
