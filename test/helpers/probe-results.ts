import type { ProbeAttempt, ProbeDirection, RoundTripResult } from '../../src/probe/interfaces/probe-result.interface';
import { FAKE_CLOCK_START } from './fake-clock';

/**
 * A successful attempt, with `overrides` applied.
 */
export function buildAttempt(direction: ProbeDirection, overrides: Partial<ProbeAttempt> = {}): ProbeAttempt {
  return {
    direction,
    token: `token-${direction}`,
    startedAt: FAKE_CLOCK_START,
    sent: true,
    received: true,
    durationMs: 0,
    ...overrides,
  };
}

export function buildRoundTrip(
  internalToExternal: Partial<ProbeAttempt> = {},
  externalToInternal: Partial<ProbeAttempt> = {},
  completedAt: number = FAKE_CLOCK_START,
): RoundTripResult {
  const attempts = {
    internal_to_external: buildAttempt('internal_to_external', internalToExternal),
    external_to_internal: buildAttempt('external_to_internal', externalToInternal),
  };
  return {
    attempts,
    totalDurationMs: attempts.internal_to_external.durationMs + attempts.external_to_internal.durationMs,
    completedAt,
  };
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}
