/**
 * Claim verifier — retrieves candidate lines for a claim and scans them in
 * rank order until one is decisive.
 *
 * The scan is lazy: candidates below the score floor are skipped, and the
 * first SUPPORTED or NOT_SUPPORTED classification ends it. Lower-ranked
 * candidates are never classified once a decisive one is found.
 */

import type { RetrievalHit, Retriever } from '../retrieval/retriever.js';
import { classify } from './classifier.js';
import { resolveVerifierConfig, type VerifierConfig } from './config.js';
import type {
  Candidate,
  ClaimVerification,
  Classification,
  Evidence,
} from './types.js';

interface JudgedHit {
  hit: RetrievalHit;
  rank: number;
  classification: Classification;
}

/** Round a retrieval score to 2 decimal places, exact halves to even. */
export function roundScore(score: number): number {
  const scaled = score * 100;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Math.round(scaled) / 100;
}

export function toCandidate(hit: RetrievalHit): Candidate {
  return {
    docId: hit.line.docId,
    score: roundScore(hit.score),
    location: hit.line.lineLabel,
  };
}

export function toEvidence(hit: RetrievalHit): Evidence {
  return {
    docId: hit.line.docId,
    location: hit.line.lineLabel,
    snippet: hit.line.text,
  };
}

export class ClaimVerifier {
  private readonly retriever: Retriever;
  readonly config: VerifierConfig;

  constructor(retriever: Retriever, config: Partial<VerifierConfig> = {}) {
    this.retriever = retriever;
    this.config = resolveVerifierConfig(config);
  }

  /**
   * Verify one claim in the context of its question.
   * The retrieval query is the question followed by the claim.
   */
  verify(claim: string, question: string): ClaimVerification {
    const hits = this.retriever.search(`${question} ${claim}`, this.config.topK);
    const candidates = hits.map(toCandidate);

    for (const judged of this.judge(claim, hits)) {
      const { label, rule } = judged.classification;
      if (label === 'INSUFFICIENT') continue;

      return {
        result: { claim, label, evidence: [toEvidence(judged.hit)] },
        candidates,
        rule,
        rank: judged.rank,
      };
    }

    return {
      result: { claim, label: 'INSUFFICIENT', evidence: [] },
      candidates,
      rule: 'none',
    };
  }

  /** Classify hits at or above the score floor, one at a time, in rank order. */
  private *judge(claim: string, hits: RetrievalHit[]): Generator<JudgedHit> {
    for (let i = 0; i < hits.length; i++) {
      const hit = hits[i];
      if (hit.score < this.config.minScore) continue;
      yield { hit, rank: i + 1, classification: classify(claim, hit.line.text, this.config) };
    }
  }
}
