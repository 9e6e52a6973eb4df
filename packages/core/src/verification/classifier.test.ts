import { describe, it, expect } from 'vitest';
import {
  classify,
  containsNegation,
  extractDayCounts,
  findContradiction,
  hasProhibition,
  overlapRatio,
} from './classifier.js';
import {
  DEFAULT_CONTRADICTION_PAIRS,
  DEFAULT_NEGATION_WORDS,
  DEFAULT_PROHIBITION_PATTERNS,
  resolveVerifierConfig,
} from './config.js';

describe('containsNegation', () => {
  it('matches inside longer words', () => {
    expect(containsNegation('Nothing is known', DEFAULT_NEGATION_WORDS)).toBe(true);
    expect(containsNegation('Appeals need a notarized form', DEFAULT_NEGATION_WORDS)).toBe(true);
    expect(containsNegation('Do not enter', DEFAULT_NEGATION_WORDS)).toBe(true);
    expect(containsNegation('Visitors are allowed in the lab', DEFAULT_NEGATION_WORDS)).toBe(false);
  });

  it('matches phrases case-insensitively with the spacing as written', () => {
    expect(containsNegation('You MUST NOT leave', ['must not'])).toBe(true);
    expect(containsNegation('You must   not leave', ['must not'])).toBe(false);
    expect(containsNegation('You must leave', ['must not'])).toBe(false);
  });

  it('ignores blank entries', () => {
    expect(containsNegation('anything', ['', '  '])).toBe(false);
  });
});

describe('hasProhibition', () => {
  it('detects prohibitive wording regardless of case', () => {
    expect(hasProhibition('Smoking is PROHIBITED indoors', DEFAULT_PROHIBITION_PATTERNS)).toBe(true);
    expect(hasProhibition('Do not feed the animals', DEFAULT_PROHIBITION_PATTERNS)).toBe(true);
    expect(hasProhibition('Smoking is allowed outside', DEFAULT_PROHIBITION_PATTERNS)).toBe(false);
  });
});

describe('extractDayCounts', () => {
  it('finds plain and working day counts in order', () => {
    expect(extractDayCounts('Within 10 working days, or 1 day when urgent')).toEqual(['10', '1']);
  });

  it('keeps leading zeros', () => {
    expect(extractDayCounts('Reply within 07 days')).toEqual(['07']);
  });

  it('returns an empty list when no day count is present', () => {
    expect(extractDayCounts('Within two weeks')).toEqual([]);
  });
});

describe('overlapRatio', () => {
  it('is the share of distinct claim terms found in the evidence', () => {
    expect(overlapRatio('Refunds take 7 days', 'refunds take days')).toBe(0.75);
  });

  it('is 0 for a claim without terms', () => {
    expect(overlapRatio('', 'anything at all')).toBe(0);
    expect(overlapRatio('?!', 'anything at all')).toBe(0);
  });
});

describe('findContradiction', () => {
  it('fires when both sides of a pair match with different text', () => {
    expect(findContradiction('Pets are allowed', 'Pets are prohibited', DEFAULT_CONTRADICTION_PAIRS)).toBe(true);
  });

  it('compares the matched text of the submission pattern', () => {
    expect(findContradiction(
      'Forms must be submitted within 5 days',
      'Forms must be submitted within 3 days',
      DEFAULT_CONTRADICTION_PAIRS,
    )).toBe(true);
    expect(findContradiction(
      'Forms must be submitted within 5 days',
      'forms must be submitted within 5 days',
      DEFAULT_CONTRADICTION_PAIRS,
    )).toBe(false);
  });

  it('does not fire when a side is missing', () => {
    expect(findContradiction('Pets are welcome', 'Pets are prohibited', DEFAULT_CONTRADICTION_PAIRS)).toBe(false);
  });
});

describe('classify', () => {
  it('refutes an affirmative claim with prohibitive evidence', () => {
    const result = classify('Employees may share passwords', 'Employees must not share passwords with anyone');
    expect(result).toEqual({ label: 'NOT_SUPPORTED', rule: 'prohibition', overlapRatio: 0.75 });
  });

  it('supports a negated claim matching prohibitive evidence', () => {
    const result = classify('Employees must not share passwords', 'Employees must not share passwords with anyone');
    expect(result).toEqual({ label: 'SUPPORTED', rule: 'overlap', overlapRatio: 1 });
  });

  it('refutes on a day-count mismatch despite full overlap otherwise', () => {
    const result = classify('Refunds are processed within 7 days', 'Refunds are processed within 3 days');
    expect(result.label).toBe('NOT_SUPPORTED');
    expect(result.rule).toBe('numeric-mismatch');
  });

  it('refutes when day counts differ only in leading zeros', () => {
    const result = classify('Refunds are processed within 07 days', 'Refunds are processed within 7 days');
    expect(result.rule).toBe('numeric-mismatch');
  });

  it('supports when day counts agree', () => {
    const result = classify('Refunds are processed within 7 days', 'Refunds are processed within 7 days');
    expect(result).toEqual({ label: 'SUPPORTED', rule: 'overlap', overlapRatio: 1 });
  });

  it('refutes on a polarity mismatch', () => {
    const result = classify('Visitors are not allowed in the lab', 'Visitors are allowed in the lab');
    expect(result.label).toBe('NOT_SUPPORTED');
    expect(result.rule).toBe('polarity-mismatch');
    expect(result.overlapRatio).toBeCloseTo(6 / 7, 10);
  });

  it('treats a negation word inside a longer word as negation', () => {
    // "notarized" contains "no"; the evidence has no negation.
    const result = classify('Appeals need a notarized form', 'Appeals need a form');
    expect(result).toEqual({ label: 'NOT_SUPPORTED', rule: 'polarity-mismatch', overlapRatio: 0.8 });
  });

  it('falls back to contradiction patterns on low overlap', () => {
    const result = classify('Pets are allowed', 'Smoking is prohibited everywhere on campus');
    expect(result).toEqual({ label: 'NOT_SUPPORTED', rule: 'contradiction-pattern', overlapRatio: 0 });
  });

  it('is INSUFFICIENT when nothing fires', () => {
    const result = classify('Parking is free', 'The cafeteria opens at noon');
    expect(result).toEqual({ label: 'INSUFFICIENT', rule: 'none', overlapRatio: 0 });
  });

  it('uses the thresholds from the config', () => {
    const strict = resolveVerifierConfig({ supportOverlap: 0.9 });
    // 3 of 4 claim terms overlap: enough by default, not under the stricter threshold.
    expect(classify('Refunds take 7 days', 'refunds take days', strict).label).toBe('INSUFFICIENT');
    expect(classify('Refunds take 7 days', 'refunds take days').label).toBe('SUPPORTED');
  });
});
