import * as p from '@clack/prompts';

import { ExitCodes } from './exit-codes.js';

/**
 * Yes/no question before a rate table mutation. Declining or pressing Ctrl-C
 * prints `cancelMessage` and exits with CANCELLED; the table is untouched.
 */
export async function confirmOrCancel(message: string, cancelMessage: string): Promise<void> {
  const answer = await p.confirm({ initialValue: true, message });
  if (p.isCancel(answer) || !answer) {
    p.cancel(cancelMessage);
    process.exit(ExitCodes.CANCELLED);
  }
}
