import { input } from '@inquirer/prompts';

import { getActiveCancelSignal } from '../cancel.js';

/**
 * Ask for one line of input. Aborts when the CLI cancellation signal fires.
 */
export async function promptInput(message: string, opts: { signal?: AbortSignal } = {}): Promise<string> {
  const signal = opts.signal ?? getActiveCancelSignal() ?? undefined;
  return await input({ message }, signal ? { signal } : {});
}
