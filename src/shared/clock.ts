import { setTimeout as delay } from 'timers/promises';

/**
 * Source of time for probes and the scheduler.
 * Injected under {@link CLOCK} so tests can run on a fake clock.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    await delay(ms);
  },
};

/**
 * Converts epoch milliseconds to the Unix seconds used by the exposition format.
 */
export function toUnixSeconds(epochMs: number): number {
  return epochMs / 1000;
}
