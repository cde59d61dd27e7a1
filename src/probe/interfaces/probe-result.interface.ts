import type { ProbeErrorKind } from '../../shared/errors';

export type ProbeDirection = 'internal_to_external' | 'external_to_internal';

export const PROBE_DIRECTIONS: readonly ProbeDirection[] = ['internal_to_external', 'external_to_internal'];

export type ProbeStage = 'send' | 'receive';

/**
 * Why an attempt failed and at which step.
 */
export interface ProbeFailure {
  stage: ProbeStage;
  kind: ProbeErrorKind;
  message: string;
}

/**
 * Outcome of one directional send → poll → delete cycle.
 *
 * `received` is only meaningful when `sent` is true; a failed send ends the attempt
 * before polling.
 */
export interface ProbeAttempt {
  direction: ProbeDirection;
  token: string;
  /** Epoch ms when the message was handed to the sender */
  startedAt: number;
  sent: boolean;
  received: boolean;
  /** From hand-off to match, or to the end of the poll window */
  durationMs: number;
  /** Set when the matched message could not be deleted; does not fail the attempt */
  cleanupError?: string;
  failure?: ProbeFailure;
}

/**
 * Both directions of one round-trip check.
 */
export interface RoundTripResult {
  attempts: Record<ProbeDirection, ProbeAttempt>;
  /** Sum of both attempts' durations */
  totalDurationMs: number;
  completedAt: number;
}
