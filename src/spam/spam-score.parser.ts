import { ScrapeError } from '../shared/errors';
import type { ParsedSpamScore } from './interfaces/spam-score.interface';

/**
 * Pattern of the summary line on the results page, e.g. "Your lovely total: 8.5/10".
 */
const TOTAL_SCORE_REGEX = /Your lovely total:\s*(-?\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)/i;

const BLOCK_ELEMENT_REGEX = /<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1>/gi;
const TAG_REGEX = /<[^>]+>/g;

const HTML_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#x2F;': '/',
  '&#47;': '/',
};

/**
 * Reduces an HTML page to its visible text: drops scripts and styles, replaces tags with
 * spaces, decodes the common entities and collapses whitespace.
 */
export function htmlToText(html: string): string {
  return html
    .replace(BLOCK_ELEMENT_REGEX, ' ')
    .replace(TAG_REGEX, ' ')
    .replace(/&(?:nbsp|amp|lt|gt|quot|#39|#x2F|#47);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Extracts the total score from a results page.
 *
 * @throws {ScrapeError} If the page has no score line
 */
export function parseSpamScore(html: string): ParsedSpamScore {
  const text = htmlToText(html);
  const match = TOTAL_SCORE_REGEX.exec(text);
  if (!match) {
    throw new ScrapeError('Spam score not found on result page (expected "Your lovely total: X/Y")');
  }

  return {
    score: Number(match[1]),
    maxScore: Number(match[2]),
  };
}
