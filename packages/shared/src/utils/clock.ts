import { delay } from 'es-toolkit';

/**
 * Time source used for timestamps and waits.
 *
 * Injected wherever the engine waits, so retry timing can be tested without real delays.
 */
export interface Clock {
  now(): Date;

  /**
   * Wait `ms` milliseconds. Rejects with es-toolkit's `AbortError` when the signal aborts.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: (ms, signal) => delay(ms, { signal }),
};
