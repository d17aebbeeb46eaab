import { describe, expect, it } from 'vitest';
import {
  SUGGESTIONS,
  SUPPORTED_QUERY,
  matchesSupportedQuery,
  normalize,
  resolveChipSelection,
  resolveQuerySubmission,
} from './queryMatcher';

describe('normalize', () => {
  it('keeps only lower-case letters and digits', () => {
    expect(normalize(SUPPORTED_QUERY)).toBe('predictthemainbearingfailuresinthenext2months');
    expect(normalize('  MB -- next 60 days!! ')).toBe('mbnext60days');
  });

  it('maps missing input to the empty string', () => {
    expect(normalize('')).toBe('');
    expect(normalize(null)).toBe('');
    expect(normalize(undefined)).toBe('');
  });

  it('drops non-ASCII letters', () => {
    expect(normalize('Café Ünïcode 42')).toBe('cafncode42');
  });
});

describe('matchesSupportedQuery', () => {
  it('accepts the reference phrase regardless of case and punctuation', () => {
    expect(matchesSupportedQuery(SUPPORTED_QUERY)).toBe(true);
    expect(matchesSupportedQuery('PREDICT the main-bearing failures, in the next 2 months')).toBe(true);
  });

  it('tolerates the misspelled chip text', () => {
    const typo = 'predict the main beraing failures in the next 2 months?';
    expect(matchesSupportedQuery(typo)).toBe(true);
  });

  it('does not let a typo change the horizon', () => {
    expect(matchesSupportedQuery('Predict the main bearing failures in the next 3 months?')).toBe(false);
    expect(matchesSupportedQuery('Predict the main bearing failures in the next 1 months?')).toBe(false);
    expect(matchesSupportedQuery('Predict the main bearing failures in the next 9 months')).toBe(false);
    expect(matchesSupportedQuery('Predict the main bearing failure in the next 5 months')).toBe(false);
    expect(matchesSupportedQuery('Predict the main bearing failures in the next 12 months?')).toBe(false);
    expect(
      resolveQuerySubmission('Predict the main bearing failures in the next 3 months?', 'https://example.test/next')
    ).toBeNull();
  });

  it('still tolerates letter typos next to the original horizon', () => {
    expect(matchesSupportedQuery('Predict teh main bearing failures in the next 2 months')).toBe(true);
  });

  it('accepts the loose predict / subject / horizon combination', () => {
    expect(matchesSupportedQuery('predict mb next 60 days')).toBe(true);
    expect(matchesSupportedQuery('Can you predict main bearing issues over the next two months?')).toBe(true);
    expect(matchesSupportedQuery('next 2 months: MB, predict')).toBe(true);
  });

  it('rejects questions missing any of the three parts', () => {
    expect(matchesSupportedQuery('main bearing failures in the next 2 months')).toBe(false);
    expect(matchesSupportedQuery('predict rotor failures in the next 2 months')).toBe(false);
    expect(matchesSupportedQuery('predict main bearing failures next 7 days')).toBe(false);
    expect(matchesSupportedQuery('How many MB failures in the next 2 months?')).toBe(false);
  });

  it('rejects empty input', () => {
    expect(matchesSupportedQuery('')).toBe(false);
    expect(matchesSupportedQuery('   ?! ')).toBe(false);
    expect(matchesSupportedQuery(null)).toBe(false);
    expect(matchesSupportedQuery(undefined)).toBe(false);
  });
});

describe('resolveChipSelection', () => {
  it('redirects only for the first suggestion', () => {
    expect(resolveChipSelection(0)).toBe('redirect');
    expect(resolveChipSelection(1)).toBe('no_action');
    expect(resolveChipSelection(2)).toBe('no_action');
    expect(resolveChipSelection(3)).toBe('no_action');
  });

  it('ignores out-of-range and non-integer indices', () => {
    expect(resolveChipSelection(-1)).toBe('no_action');
    expect(resolveChipSelection(SUGGESTIONS.length)).toBe('no_action');
    expect(resolveChipSelection(0.5)).toBe('no_action');
    expect(resolveChipSelection(Number.NaN)).toBe('no_action');
  });

  it('ignores chips that were never clicked', () => {
    expect(resolveChipSelection(0, [0, 0, 0, 0])).toBe('no_action');
    expect(resolveChipSelection(0, [])).toBe('no_action');
    expect(resolveChipSelection(0, [1, 0, 0, 0])).toBe('redirect');
    expect(resolveChipSelection(1, [0, 2, 0, 0])).toBe('no_action');
  });
});

describe('resolveQuerySubmission', () => {
  it('returns the redirect target for a supported question', () => {
    expect(resolveQuerySubmission(SUPPORTED_QUERY, 'https://example.test/next')).toBe('https://example.test/next');
  });

  it('returns null otherwise', () => {
    expect(resolveQuerySubmission('Top contributors to outage risk right now?', 'https://example.test/next')).toBeNull();
  });

  it('defaults to the configured redirect URL', () => {
    expect(resolveQuerySubmission('predict mb next2months')).toBe('https://app.causify.ai/sentinel');
  });
});

describe('SUGGESTIONS', () => {
  it('fills the first chip with the reference phrase', () => {
    expect(SUGGESTIONS[0].query).toBe(SUPPORTED_QUERY);
    expect(SUGGESTIONS[0].label).toContain('beraing');
  });
});
