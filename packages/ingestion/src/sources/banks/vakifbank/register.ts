import { registerSourceAdapter } from '../../../shared/types/source-adapter.js';

import { VakifbankAdapter } from './adapter.js';

export function registerVakifbank(): void {
  registerSourceAdapter({
    bankId: 'vakifbank',
    create: (config) => new VakifbankAdapter(config),
  });
}
