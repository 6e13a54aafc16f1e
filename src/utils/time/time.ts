/**
 * Time utility functions
 */

import { setTimeout as delay } from 'timers/promises';

/**
 * Wall clock used by the monitor
 */
export function systemClock(): Date {
  return new Date();
}

/**
 * Wait for `ms` milliseconds or until `signal` aborts, whichever comes first.
 * Resolves `false` when the wait was cut short by the signal.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }

  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) {
      return false;
    }
    throw err;
  }
}
