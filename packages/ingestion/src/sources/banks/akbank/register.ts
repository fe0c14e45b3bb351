import { registerSourceAdapter } from '../../../shared/types/source-adapter.js';

import { AkbankAdapter } from './adapter.js';

export function registerAkbank(): void {
  registerSourceAdapter({
    bankId: 'akbank',
    create: (config) => new AkbankAdapter(config),
  });
}
