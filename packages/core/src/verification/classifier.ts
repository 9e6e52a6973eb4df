/**
 * Claim/evidence classifier — decides whether one evidence line supports,
 * contradicts, or says nothing decisive about a claim.
 *
 * Rules run in a fixed order and the first one that fires wins:
 *
 *   1. prohibition       evidence forbids, claim is affirmative, overlap ≥ prohibitionOverlap
 *   2. numeric-mismatch  first "<n> [working] day(s)" differs between claim and evidence
 *   3. overlap           overlap ≥ supportOverlap: SUPPORTED, or NOT_SUPPORTED on polarity mismatch
 *   4. contradiction     a contradiction pattern pair matches with different text
 *   5. none              INSUFFICIENT
 *
 * Rules 1 and 2 run before rule 3, so a high-overlap line can still refute.
 */

import { termSet } from '../retrieval/tokenizer.js';
import { DEFAULT_VERIFIER_CONFIG, type ContradictionPair, type VerifierConfig } from './config.js';
import type { Classification } from './types.js';

const DAY_COUNT_PATTERN = /\b(\d+)\s*(?:working\s+)?days?\b/g;

/**
 * True when any negation word or phrase occurs in the lowercased text as a
 * plain substring, so `no` also fires inside `notice`.
 */
export function containsNegation(text: string, negationWords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return negationWords.some(word => word.trim() !== '' && lower.includes(word.toLowerCase()));
}

/** True when any prohibitive pattern matches the lowercased text. */
export function hasProhibition(text: string, patterns: readonly RegExp[]): boolean {
  const lower = text.toLowerCase();
  return patterns.some(pattern => pattern.test(lower));
}

/**
 * All day counts ("7 days", "10 working days", "1 day") in order of
 * appearance, as the matched digits. "07 days" and "7 days" differ.
 */
export function extractDayCounts(text: string): string[] {
  return [...text.toLowerCase().matchAll(DAY_COUNT_PATTERN)].map(match => match[1]);
}

/**
 * True when both sides of some contradiction pair match and the matched
 * texts differ. Both texts are compared lowercased.
 */
export function findContradiction(
  claim: string,
  evidence: string,
  pairs: readonly ContradictionPair[],
): boolean {
  const claimLower = claim.toLowerCase();
  const evidenceLower = evidence.toLowerCase();

  return pairs.some(pair => {
    const claimMatch = pair.claim.exec(claimLower);
    const evidenceMatch = pair.evidence.exec(evidenceLower);
    return claimMatch !== null && evidenceMatch !== null && claimMatch[0] !== evidenceMatch[0];
  });
}

/** |claim terms ∩ evidence terms| / |claim terms|, or 0 when the claim has no terms. */
export function overlapRatio(claim: string, evidence: string): number {
  const claimTerms = termSet(claim);
  if (claimTerms.size === 0) return 0;

  const evidenceTerms = termSet(evidence);
  let shared = 0;
  for (const term of claimTerms) {
    if (evidenceTerms.has(term)) shared++;
  }
  return shared / claimTerms.size;
}

/**
 * Classify a claim against one evidence line.
 */
export function classify(
  claim: string,
  evidence: string,
  config: VerifierConfig = DEFAULT_VERIFIER_CONFIG,
): Classification {
  const ratio = overlapRatio(claim, evidence);
  const claimNegated = containsNegation(claim, config.negationWords);

  if (!claimNegated
    && ratio >= config.prohibitionOverlap
    && hasProhibition(evidence, config.prohibitionPatterns)) {
    return { label: 'NOT_SUPPORTED', rule: 'prohibition', overlapRatio: ratio };
  }

  const claimDays = extractDayCounts(claim);
  const evidenceDays = extractDayCounts(evidence);
  if (claimDays.length > 0 && evidenceDays.length > 0 && claimDays[0] !== evidenceDays[0]) {
    return { label: 'NOT_SUPPORTED', rule: 'numeric-mismatch', overlapRatio: ratio };
  }

  if (ratio >= config.supportOverlap) {
    const evidenceNegated = containsNegation(evidence, config.negationWords);
    if (claimNegated !== evidenceNegated) {
      return { label: 'NOT_SUPPORTED', rule: 'polarity-mismatch', overlapRatio: ratio };
    }
    return { label: 'SUPPORTED', rule: 'overlap', overlapRatio: ratio };
  }

  if (findContradiction(claim, evidence, config.contradictionPairs)) {
    return { label: 'NOT_SUPPORTED', rule: 'contradiction-pattern', overlapRatio: ratio };
  }

  return { label: 'INSUFFICIENT', rule: 'none', overlapRatio: ratio };
}
