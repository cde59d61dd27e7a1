import { METRIC_NAMES } from '../metrics/metrics.constants';
import type { CounterName } from '../metrics/metrics.constants';
import type { MetricsUpdate } from '../metrics/interfaces';
import { classifyError } from '../shared/errors';
import { getErrorMessage } from '../shared/error.utils';
import { toUnixSeconds } from '../shared/clock';
import { PROBE_DIRECTIONS } from '../probe/interfaces/probe-result.interface';
import type { ProbeAttempt, ProbeDirection, RoundTripResult } from '../probe/interfaces/probe-result.interface';

interface DirectionCounters {
  sendSuccess: CounterName;
  sendFailures: CounterName;
  receiveSuccess: CounterName;
  receiveFailures: CounterName;
}

export const DIRECTION_COUNTERS: Record<ProbeDirection, DirectionCounters> = {
  internal_to_external: {
    sendSuccess: METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_SUCCESS,
    sendFailures: METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_FAILURES,
    receiveSuccess: METRIC_NAMES.RECEIVE_INTERNAL_TO_EXTERNAL_SUCCESS,
    receiveFailures: METRIC_NAMES.RECEIVE_INTERNAL_TO_EXTERNAL_FAILURES,
  },
  external_to_internal: {
    sendSuccess: METRIC_NAMES.SEND_EXTERNAL_TO_INTERNAL_SUCCESS,
    sendFailures: METRIC_NAMES.SEND_EXTERNAL_TO_INTERNAL_FAILURES,
    receiveSuccess: METRIC_NAMES.RECEIVE_EXTERNAL_TO_INTERNAL_SUCCESS,
    receiveFailures: METRIC_NAMES.RECEIVE_EXTERNAL_TO_INTERNAL_FAILURES,
  },
};

/**
 * Counter increments for one attempt: exactly one of success/failure for the send step,
 * and, when the send went through, exactly one for the receive step.
 */
export function attemptIncrements(attempt: ProbeAttempt): CounterName[] {
  const counters = DIRECTION_COUNTERS[attempt.direction];
  if (!attempt.sent) {
    return [counters.sendFailures];
  }
  return [counters.sendSuccess, attempt.received ? counters.receiveSuccess : counters.receiveFailures];
}

/**
 * Translates a finished round trip into the registry update it causes.
 *
 * The working gauges are 1 only when both directions' latest attempt succeeded at that step;
 * a receive that never ran because its send failed counts as not working.
 */
export function roundTripUpdate(result: RoundTripResult): MetricsUpdate {
  const attempts = PROBE_DIRECTIONS.map((direction) => result.attempts[direction]);

  return {
    increments: attempts.flatMap(attemptIncrements),
    gauges: {
      [METRIC_NAMES.SENDING_WORKING]: attempts.every((attempt) => attempt.sent) ? 1 : 0,
      [METRIC_NAMES.RECEIVING_WORKING]: attempts.every((attempt) => attempt.received) ? 1 : 0,
      [METRIC_NAMES.ROUNDTRIP_DURATION_SECONDS]: result.totalDurationMs / 1000,
      [METRIC_NAMES.LAST_SEND_RECEIVE_CHECK]: toUnixSeconds(result.completedAt),
    },
  };
}

/**
 * Round trip result for a check that blew up outside of the probe's own error handling:
 * both directions count as failed sends.
 */
export function failedRoundTrip(error: unknown, startedAt: number, now: number): RoundTripResult {
  const failure = { stage: 'send' as const, kind: classifyError(error), message: getErrorMessage(error) };
  const failed = (direction: ProbeDirection): ProbeAttempt => ({
    direction,
    token: '',
    startedAt,
    sent: false,
    received: false,
    durationMs: 0,
    failure,
  });

  return {
    attempts: {
      internal_to_external: failed('internal_to_external'),
      external_to_internal: failed('external_to_internal'),
    },
    totalDurationMs: 0,
    completedAt: now,
  };
}
