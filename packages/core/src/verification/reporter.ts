/**
 * Verification reporter — label statistics and quality checks over packs.
 */

import type {
  EvaluationReport,
  Pack,
  QualityWarning,
  VerificationSummary,
} from './types.js';

/** Below this share of INSUFFICIENT labels the run looks over-confident. */
const LOW_INSUFFICIENT_RATE = 0.05;
/** Above this share of SUPPORTED labels negation handling deserves a second look. */
const HIGH_SUPPORTED_RATE = 0.9;

/**
 * Compute aggregate statistics across packs.
 */
export function computeSummary(packs: Pack[]): VerificationSummary {
  const claims = packs.flatMap(p => p.claims);

  return {
    totalPacks: packs.length,
    totalClaims: claims.length,
    supported: claims.filter(c => c.label === 'SUPPORTED').length,
    notSupported: claims.filter(c => c.label === 'NOT_SUPPORTED').length,
    insufficient: claims.filter(c => c.label === 'INSUFFICIENT').length,
    withEvidence: claims.filter(c => c.evidence.length > 0).length,
    packsWithCandidates: packs.filter(p => p.retrievalLog.candidates.length > 0).length,
  };
}

/**
 * Summarize packs and flag label distributions that suggest miscalibration.
 * At most one warning is raised; the low-INSUFFICIENT check takes precedence.
 */
export function evaluatePacks(packs: Pack[]): EvaluationReport {
  const summary = computeSummary(packs);
  const warnings: QualityWarning[] = [];
  const total = summary.totalClaims;

  if (summary.insufficient < total * LOW_INSUFFICIENT_RATE) {
    warnings.push({
      code: 'low-insufficient',
      message: 'Low INSUFFICIENT rate - may be over-confident',
    });
  } else if (summary.supported > total * HIGH_SUPPORTED_RATE) {
    warnings.push({
      code: 'high-supported',
      message: 'Very high SUPPORTED rate - double check negation handling',
    });
  }

  return { summary, warnings };
}

/** Percentage of `count` in `total`, 0 when `total` is 0. */
export function formatPercent(count: number, total: number, digits = 1): string {
  const pct = total > 0 ? (100 * count) / total : 0;
  return pct.toFixed(digits);
}
