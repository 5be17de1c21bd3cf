import { setTimeout as delay } from 'timers/promises';
import { TrimInterruptedError } from '../errors';

/**
 * Waits `seconds`, rejecting with TrimInterruptedError as soon as `signal`
 * aborts (or immediately, if it already has).
 */
export type Sleeper = (seconds: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (seconds, signal) => {
  if (signal?.aborted) {
    throw new TrimInterruptedError();
  }
  try {
    await delay(seconds * 1000, undefined, { signal });
  } catch (error: unknown) {
    if (signal?.aborted) {
      throw new TrimInterruptedError();
    }
    throw error;
  }
};
