import { randomBytes } from 'crypto';

let sequence = 0;

/**
 * Generate a correlation token for one probe attempt.
 *
 * Combines the current time, a per-process sequence number and 48 random bits, so two
 * tokens never collide within a process and practically never across restarts.
 * Only `[0-9a-z-]` is used, which keeps the token safe inside an IMAP SUBJECT search.
 */
export function newCorrelationToken(now: number = Date.now()): string {
  sequence = (sequence + 1) % Number.MAX_SAFE_INTEGER;
  return `${now.toString(36)}-${sequence.toString(36)}-${randomBytes(6).toString('hex')}`;
}

export const PROBE_SUBJECT_PREFIX = 'Mail Health Exporter - ';

/**
 * Subject line carrying the token; the receive side searches on it.
 */
export function buildProbeSubject(token: string): string {
  return `${PROBE_SUBJECT_PREFIX}${token}`;
}
