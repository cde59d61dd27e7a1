import type { Clock } from '../shared/clock';

export interface PollOptions {
  /** Pause between two checks */
  intervalMs: number;
  /** Total window, measured from the first check */
  timeoutMs: number;
  clock: Clock;
  /** Errors for which retrying is pointless; they are rethrown immediately */
  isFatal?: (error: unknown) => boolean;
}

export type PollResult<T> =
  | { status: 'matched'; value: T; attempts: number; elapsedMs: number }
  | {
      status: 'timed_out';
      attempts: number;
      elapsedMs: number;
      /** Error raised by the final check, if that check failed */
      lastError?: unknown;
    };

/**
 * Runs `check` every `intervalMs` until it yields a value or `timeoutMs` has passed.
 *
 * `check` signals "not yet" by resolving `undefined`. The last sleep is shortened so
 * the final check lands on the deadline. Non-fatal errors are kept and retried.
 */
export async function pollUntil<T>(check: () => Promise<T | undefined>, options: PollOptions): Promise<PollResult<T>> {
  const { clock, intervalMs, timeoutMs, isFatal } = options;
  const startedAt = clock.now();
  const deadline = startedAt + timeoutMs;
  let attempts = 0;
  let lastError: unknown;

  for (;;) {
    attempts++;
    try {
      const value = await check();
      lastError = undefined;
      if (value !== undefined) {
        return { status: 'matched', value, attempts, elapsedMs: clock.now() - startedAt };
      }
    } catch (error) {
      if (isFatal?.(error)) {
        throw error;
      }
      lastError = error;
    }

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      return { status: 'timed_out', attempts, elapsedMs: clock.now() - startedAt, lastError };
    }
    await clock.sleep(Math.min(intervalMs, remaining));
  }
}
