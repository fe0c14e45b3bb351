import { registerSourceAdapter } from '../../../shared/types/source-adapter.js';

import { GarantiAdapter } from './adapter.js';

export function registerGaranti(): void {
  registerSourceAdapter({
    bankId: 'garanti',
    create: (config) => new GarantiAdapter(config),
  });
}
