import { registerSourceAdapter } from '../../../shared/types/source-adapter.js';

import { IsbankAdapter } from './adapter.js';

export function registerIsbank(): void {
  registerSourceAdapter({
    bankId: 'isbank',
    create: (config) => new IsbankAdapter(config),
  });
}
