import { registerSourceAdapter } from '../../../shared/types/source-adapter.js';

import { ZiraatAdapter } from './adapter.js';

export function registerZiraat(): void {
  registerSourceAdapter({
    bankId: 'ziraat',
    create: (config) => new ZiraatAdapter(config),
  });
}
