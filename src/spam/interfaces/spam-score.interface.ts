import type { ProbeFailure } from '../../probe/interfaces/probe-result.interface';

/**
 * A score read back from the scoring service.
 */
export interface ParsedSpamScore {
  score: number;
  /** Upper bound of the vendor's scale, when the page states one */
  maxScore?: number;
}

export interface SpamScoreResult extends ParsedSpamScore {
  sourceUrl: string;
  /** Epoch ms */
  checkedAt: number;
}

export type SpamScoreOutcome =
  | { status: 'skipped'; nextEligibleAt: number }
  | { status: 'scored'; result: SpamScoreResult }
  | { status: 'failed'; failure: ProbeFailure };

/**
 * "Can retrieve a rendered score from a known URL."
 */
export interface ScoreFetcher {
  fetchScore(url: string): Promise<ParsedSpamScore>;
}

export const SCORE_FETCHER = Symbol('SCORE_FETCHER');
