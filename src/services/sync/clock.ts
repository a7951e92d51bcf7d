import { setTimeout as sleepFor } from "node:timers/promises";

/**
 * Time source for the scheduler and stage runner; tests pass a fake one.
 */
export interface Clock {
  now(): Date;
  /** Resolves after `ms`, or early once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  async sleep(ms, signal) {
    if (signal?.aborted === true) {
      return;
    }
    try {
      await sleepFor(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        return;
      }
      throw error;
    }
  },
};
