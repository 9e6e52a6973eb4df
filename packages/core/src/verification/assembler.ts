/**
 * Pack assembler — runs the verifier over every claim of a question and
 * folds the results into one pack.
 */

import type { Qid } from '../corpus/types.js';
import type { ClaimVerifier } from './verifier.js';
import type { Candidate, ClaimResult, ClaimVerification, Pack } from './types.js';

/** Answer used when no claim of a question is SUPPORTED. */
export const INSUFFICIENT_ANSWER = 'Insufficient evidence to provide a definitive answer.';

/** Join the SUPPORTED claims in claim order, or fall back to {@link INSUFFICIENT_ANSWER}. */
export function buildAnswer(results: ClaimResult[]): string {
  const supported = results.filter(r => r.label === 'SUPPORTED').map(r => r.claim);
  return supported.length > 0 ? supported.join('; ') : INSUFFICIENT_ANSWER;
}

/**
 * Deduplicate candidates by (docId, location), keeping the highest score.
 * The pool is stable-sorted by score first, so the first occurrence after
 * sorting is the one kept.
 */
export function dedupeCandidates(pool: Candidate[], limit: number): Candidate[] {
  const seen = new Set<string>();
  const unique: Candidate[] = [];

  for (const candidate of [...pool].sort((a, b) => b.score - a.score)) {
    const key = `${candidate.docId}\u0000${candidate.location}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(candidate);
  }

  return unique.slice(0, limit);
}

export interface AssembleOptions {
  /** Called after each claim is verified, in claim order. */
  onClaim?: (verification: ClaimVerification, index: number) => void;
}

export class PackAssembler {
  private readonly verifier: ClaimVerifier;

  constructor(verifier: ClaimVerifier) {
    this.verifier = verifier;
  }

  assemble(qid: Qid, question: string, claims: readonly string[], options: AssembleOptions = {}): Pack {
    const results: ClaimResult[] = [];
    const pool: Candidate[] = [];

    claims.forEach((claim, index) => {
      const verification = this.verifier.verify(claim, question);
      results.push(verification.result);
      pool.push(...verification.candidates);
      options.onClaim?.(verification, index);
    });

    const { topK, logLimit } = this.verifier.config;

    return {
      qid,
      answer: buildAnswer(results),
      claims: results,
      retrievalLog: {
        topK,
        candidates: dedupeCandidates(pool, logLimit),
      },
    };
  }
}
