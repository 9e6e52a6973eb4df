// Types
export {
  VERDICT_LABELS,
  type VerdictLabel,
  type ClassificationRule,
  type Classification,
  type Evidence,
  type ClaimResult,
  type Candidate,
  type ClaimVerification,
  type RetrievalLog,
  type Pack,
  type VerificationSummary,
  type QualityWarningCode,
  type QualityWarning,
  type EvaluationReport,
} from './types.js';

// Config
export {
  DEFAULT_VERIFIER_CONFIG,
  DEFAULT_NEGATION_WORDS,
  DEFAULT_PROHIBITION_PATTERNS,
  DEFAULT_CONTRADICTION_PAIRS,
  resolveVerifierConfig,
  type VerifierConfig,
  type ContradictionPair,
} from './config.js';

// Classifier
export {
  classify,
  containsNegation,
  hasProhibition,
  extractDayCounts,
  findContradiction,
  overlapRatio,
} from './classifier.js';

// Verifier
export {
  ClaimVerifier,
  roundScore,
  toCandidate,
  toEvidence,
} from './verifier.js';

// Assembler
export {
  PackAssembler,
  INSUFFICIENT_ANSWER,
  buildAnswer,
  dedupeCandidates,
  type AssembleOptions,
} from './assembler.js';

// Reporter
export {
  computeSummary,
  evaluatePacks,
  formatPercent,
} from './reporter.js';
