import { registerSourceAdapter } from '../../../shared/types/source-adapter.js';

import { HalkbankAdapter } from './adapter.js';

export function registerHalkbank(): void {
  registerSourceAdapter({
    bankId: 'halkbank',
    create: (config) => new HalkbankAdapter(config),
  });
}
