import { registerSourceAdapter } from '../../../shared/types/source-adapter.js';

import { QnbAdapter } from './adapter.js';

export function registerQnb(): void {
  registerSourceAdapter({
    bankId: 'qnb',
    create: (config) => new QnbAdapter(config),
  });
}
