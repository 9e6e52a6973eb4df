/**
 * Verifier configuration: thresholds, word lists and patterns used by the
 * classifier and the candidate scan. Passed explicitly to the verifier so
 * callers and tests can override any of it without global state.
 */

/** A claim-side and evidence-side pattern that contradict when both match with different text. */
export interface ContradictionPair {
  claim: RegExp;
  evidence: RegExp;
}

export interface VerifierConfig {
  /** Retrieval depth per claim. */
  topK: number;
  /** Hits scoring below this are never classified. */
  minScore: number;
  /** Minimum overlap for a prohibitive evidence line to refute an affirmative claim. */
  prohibitionOverlap: number;
  /** Minimum overlap for the overlap rule (SUPPORTED, or NOT_SUPPORTED on polarity mismatch). */
  supportOverlap: number;
  /** Maximum candidates kept in a pack's retrieval log. */
  logLimit: number;
  /** Words and phrases that negate a sentence. Matched at word boundaries. */
  negationWords: string[];
  /** Patterns that mark an evidence line as prohibitive. Applied to lowercased text. */
  prohibitionPatterns: RegExp[];
  /** Fallback contradiction patterns. Applied to lowercased text. */
  contradictionPairs: ContradictionPair[];
}

export const DEFAULT_NEGATION_WORDS: readonly string[] = [
  'not',
  'never',
  'no',
  'cannot',
  'prohibited',
  'must not',
  'should not',
];

export const DEFAULT_PROHIBITION_PATTERNS: readonly RegExp[] = [
  /\bdo not\b/,
  /\bmust not\b/,
  /\bshould not\b/,
  /\bprohibited\b/,
  /\bnever\b/,
  /\bcannot\b/,
];

export const DEFAULT_CONTRADICTION_PAIRS: readonly ContradictionPair[] = [
  { claim: /must\s+be\s+submitted.*?(\d+)/, evidence: /must\s+be\s+submitted.*?(\d+)/ },
  { claim: /allowed/, evidence: /prohibited/ },
  { claim: /required/, evidence: /not required/ },
  { claim: /can\s+be/, evidence: /cannot\s+be/ },
];

export const DEFAULT_VERIFIER_CONFIG: Readonly<VerifierConfig> = {
  topK: 10,
  minScore: 3.0,
  prohibitionOverlap: 0.3,
  supportOverlap: 0.4,
  logLimit: 10,
  negationWords: [...DEFAULT_NEGATION_WORDS],
  prohibitionPatterns: [...DEFAULT_PROHIBITION_PATTERNS],
  contradictionPairs: [...DEFAULT_CONTRADICTION_PAIRS],
};

/** Merge overrides over the defaults. Lists replace the default list, they do not append. */
export function resolveVerifierConfig(overrides: Partial<VerifierConfig> = {}): VerifierConfig {
  const defaults = DEFAULT_VERIFIER_CONFIG;
  return {
    topK: overrides.topK ?? defaults.topK,
    minScore: overrides.minScore ?? defaults.minScore,
    prohibitionOverlap: overrides.prohibitionOverlap ?? defaults.prohibitionOverlap,
    supportOverlap: overrides.supportOverlap ?? defaults.supportOverlap,
    logLimit: overrides.logLimit ?? defaults.logLimit,
    negationWords: [...(overrides.negationWords ?? defaults.negationWords)],
    prohibitionPatterns: [...(overrides.prohibitionPatterns ?? defaults.prohibitionPatterns)],
    contradictionPairs: [...(overrides.contradictionPairs ?? defaults.contradictionPairs)],
  };
}
