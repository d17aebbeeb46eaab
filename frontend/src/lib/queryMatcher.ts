/**
 * Matching of free-text questions against the single supported analytic query.
 *
 * Comparison happens on the canonical form (lower-case alphanumerics only), so
 * punctuation and spacing never matter. A canonical form within two edits of
 * the reference phrase still counts as the reference phrase, as long as its
 * digits are the same: a typo may not move the horizon.
 */

import { distance } from 'fastest-levenshtein';
import { config } from './config';

export type ChipDecision = 'redirect' | 'no_action';

export interface Suggestion {
  /** Text shown on the chip */
  label: string;
  /** Text placed in the question input when the chip is clicked */
  query: string;
}

export const SUPPORTED_QUERY = 'Predict the main bearing failures in the next 2 months?';

export const SUGGESTIONS: readonly Suggestion[] = [
  {
    label: 'Predict the main beraing failures in the next 2 months?',
    query: SUPPORTED_QUERY,
  },
  {
    label: 'Which signals predict rotor issues next 7 days?',
    query: 'Which signals predict rotor issues next 7 days?',
  },
  {
    label: 'Top contributors to outage risk right now?',
    query: 'Top contributors to outage risk right now?',
  },
  {
    label: 'How many MB failures in the next 2 months?',
    query: 'How many MB failures in the next 2 months?',
  },
];

const REDIRECT_CHIP_INDEX = 0;

export function normalize(text: string | null | undefined): string {
  return (text ?? '').toLowerCase().replace(/[^a-z0-9]+/g, '');
}

const SUPPORTED_CANONICAL = normalize(SUPPORTED_QUERY);

function digitsOf(canonical: string): string {
  return canonical.replace(/[^0-9]/g, '');
}

const SUPPORTED_DIGITS = digitsOf(SUPPORTED_CANONICAL);

// Enough for a swapped pair of letters, e.g. "beraing"
const MAX_TYPO_DISTANCE = 2;

const SUBJECT_TERMS = ['mainbearing', 'mb'];
const HORIZON_TERMS = ['next2months', 'nexttwomonths', 'next60days'];

export function matchesSupportedQuery(text: string | null | undefined): boolean {
  const canonical = normalize(text);
  if (!canonical) return false;
  if (
    digitsOf(canonical) === SUPPORTED_DIGITS &&
    distance(canonical, SUPPORTED_CANONICAL) <= MAX_TYPO_DISTANCE
  ) {
    return true;
  }

  return (
    canonical.includes('predict') &&
    SUBJECT_TERMS.some((term) => canonical.includes(term)) &&
    HORIZON_TERMS.some((term) => canonical.includes(term))
  );
}

/**
 * Decide what a suggestion chip click does.
 *
 * When `clickCounts` is given, a chip that has never been clicked resolves to
 * `no_action` even if its index is valid.
 */
export function resolveChipSelection(
  chipIndex: number,
  clickCounts?: readonly number[]
): ChipDecision {
  if (!Number.isInteger(chipIndex) || chipIndex < 0 || chipIndex >= SUGGESTIONS.length) {
    return 'no_action';
  }
  if (clickCounts) {
    const clicks = clickCounts[chipIndex];
    if (clicks === undefined || clicks <= 0) return 'no_action';
  }
  return chipIndex === REDIRECT_CHIP_INDEX ? 'redirect' : 'no_action';
}

export function resolveQuerySubmission(
  text: string | null | undefined,
  redirectUrl: string = config.redirectUrl
): string | null {
  return matchesSupportedQuery(text) ? redirectUrl : null;
}
