/**
 * Verification system types.
 *
 * The verification module checks each claim against ranked corpus lines,
 * labels it SUPPORTED / NOT_SUPPORTED / INSUFFICIENT with the one line that
 * justifies the label, and folds the claims of a question into a pack.
 */

import type { Qid } from '../corpus/types.js';

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

export const VERDICT_LABELS = ['SUPPORTED', 'NOT_SUPPORTED', 'INSUFFICIENT'] as const;

export type VerdictLabel = typeof VERDICT_LABELS[number];

/** Which classification rule produced a label. */
export type ClassificationRule =
  | 'prohibition'
  | 'numeric-mismatch'
  | 'polarity-mismatch'
  | 'overlap'
  | 'contradiction-pattern'
  | 'none';

export interface Classification {
  label: VerdictLabel;
  rule: ClassificationRule;
  /** |claim terms ∩ evidence terms| / |claim terms|, 0 for an empty claim. */
  overlapRatio: number;
}

// ---------------------------------------------------------------------------
// Evidence and results
// ---------------------------------------------------------------------------

/** A citation of one corpus line. */
export interface Evidence {
  docId: string;
  location: string;
  snippet: string;
}

/** Verdict for one claim. `evidence` is empty exactly when the label is INSUFFICIENT. */
export interface ClaimResult {
  claim: string;
  label: VerdictLabel;
  evidence: Evidence[];
}

/** Loggable projection of a retrieval hit. Score is rounded to 2 decimals. */
export interface Candidate {
  docId: string;
  score: number;
  location: string;
}

/** What the verifier returns for one claim. */
export interface ClaimVerification {
  result: ClaimResult;
  /** Every retrieved hit, whether or not it was judged. */
  candidates: Candidate[];
  /** Rule behind the label; 'none' when no candidate was decisive. */
  rule: ClassificationRule;
  /** 1-based rank of the evidence line among retrieved hits. */
  rank?: number;
}

// ---------------------------------------------------------------------------
// Packs
// ---------------------------------------------------------------------------

export interface RetrievalLog {
  /** Configured retrieval depth, independent of how many candidates appear. */
  topK: number;
  /** Deduplicated by (docId, location), score-sorted, capped. */
  candidates: Candidate[];
}

/** Per-question output bundle. */
export interface Pack {
  qid: Qid;
  answer: string;
  claims: ClaimResult[];
  retrievalLog: RetrievalLog;
}

// ---------------------------------------------------------------------------
// Summary / evaluation
// ---------------------------------------------------------------------------

export interface VerificationSummary {
  totalPacks: number;
  totalClaims: number;
  supported: number;
  notSupported: number;
  insufficient: number;
  /** Claims that cite at least one evidence line. */
  withEvidence: number;
  /** Packs whose retrieval log holds at least one candidate. */
  packsWithCandidates: number;
}

export type QualityWarningCode = 'low-insufficient' | 'high-supported';

export interface QualityWarning {
  code: QualityWarningCode;
  message: string;
}

export interface EvaluationReport {
  summary: VerificationSummary;
  warnings: QualityWarning[];
}
