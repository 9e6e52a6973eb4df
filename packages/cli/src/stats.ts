import { formatPercent, type ClaimVerification, type EvaluationReport, type VerificationSummary } from '@claimtrace/core';

const RULE = '='.repeat(50);

/** Claims summary printed after a run. */
export function formatClaimsSummary(summary: VerificationSummary): string[] {
  const total = summary.totalClaims;
  return [
    'Claims Summary:',
    `  - Total claims: ${total}`,
    `  - SUPPORTED: ${summary.supported} (${formatPercent(summary.supported, total)}%)`,
    `  - NOT_SUPPORTED: ${summary.notSupported} (${formatPercent(summary.notSupported, total)}%)`,
    `  - INSUFFICIENT: ${summary.insufficient} (${formatPercent(summary.insufficient, total)}%)`,
  ];
}

/** Evaluation report for `claimtrace eval`: label distribution, evidence coverage and quality checks. */
export function formatEvaluation({ summary, warnings }: EvaluationReport): string[] {
  const total = summary.totalClaims;
  const lines = [
    RULE,
    'Verification Pack Evaluation',
    RULE,
    '',
    `Label Distribution (${total} claims):`,
    `  SUPPORTED: ${summary.supported} (${formatPercent(summary.supported, total, 0)}%)`,
    `  NOT_SUPPORTED: ${summary.notSupported} (${formatPercent(summary.notSupported, total, 0)}%)`,
    `  INSUFFICIENT: ${summary.insufficient} (${formatPercent(summary.insufficient, total, 0)}%)`,
    '',
    'Evidence Coverage:',
    `  Claims with evidence: ${summary.withEvidence}/${total}`,
    `  Packs with candidates: ${summary.packsWithCandidates}/${summary.totalPacks}`,
    '',
    'Quality Checks:',
  ];

  if (warnings.length === 0) {
    lines.push('  [OK] All checks passed');
  } else {
    lines.push(...warnings.map(w => `  [!] ${w.message}`));
  }

  lines.push(RULE);
  return lines;
}

/** One verdict with the rule that produced it and the cited line, for verbose output. */
export function formatVerdictLine({ result, rule, rank }: ClaimVerification): string {
  const evidence = result.evidence[0];
  const base = `[${result.label}] ${result.claim}`;
  if (!evidence) return base;
  const at = rank === undefined ? '' : `, rank ${rank}`;
  return `${base} (${rule} @ ${evidence.docId}:${evidence.location}${at})`;
}
