/**
 * Markdown audit report.
 *
 * Produces a human-readable companion to packs.jsonl with:
 * - A summary table of label counts
 * - Per question: the answer, each claim with a label badge and a footnote
 *   citing its evidence line, and the retrieval log
 */

import { computeSummary, formatPercent } from '../verification/reporter.js';
import type { Pack, VerdictLabel, VerificationSummary } from '../verification/types.js';

export interface MarkdownFormatOptions {
  packs: Pack[];
  /** Report title. Default: 'Verification Report'. */
  title?: string;
  /** Include each pack's retrieval log table. Default: true. */
  includeRetrievalLog?: boolean;
}

/**
 * Format packs as a markdown document.
 */
export function formatPacksMarkdown(options: MarkdownFormatOptions): string {
  const { packs, title = 'Verification Report', includeRetrievalLog = true } = options;
  const summary = computeSummary(packs);
  const lines: string[] = [];

  lines.push(`# ${title}\n`);
  lines.push(buildSummarySection(summary));

  for (const pack of packs) {
    lines.push('');
    lines.push(buildPackSection(pack, includeRetrievalLog));
  }

  return lines.join('\n') + '\n';
}

function buildSummarySection(summary: VerificationSummary): string {
  const total = summary.totalClaims;
  const lines: string[] = [];

  lines.push('## Summary\n');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Questions | ${summary.totalPacks} |`);
  lines.push(`| Claims | ${total} |`);
  lines.push(`| Supported | ${summary.supported} (${formatPercent(summary.supported, total)}%) |`);
  lines.push(`| Not supported | ${summary.notSupported} (${formatPercent(summary.notSupported, total)}%) |`);
  lines.push(`| Insufficient | ${summary.insufficient} (${formatPercent(summary.insufficient, total)}%) |`);
  lines.push(`| Claims with evidence | ${summary.withEvidence}/${total} |`);

  return lines.join('\n');
}

function buildPackSection(pack: Pack, includeRetrievalLog: boolean): string {
  const lines: string[] = [];
  const footnotes: string[] = [];

  lines.push(`## ${pack.qid}\n`);
  lines.push(`**Answer:** ${pack.answer}\n`);

  if (pack.claims.length === 0) {
    lines.push('_No claims._');
  }

  pack.claims.forEach((result, i) => {
    const evidence = result.evidence[0];
    const noteId = `${pack.qid}-${i + 1}`;
    const marker = evidence ? `[^${noteId}]` : '';
    lines.push(`- ${getLabelBadge(result.label)} ${escapeInline(result.claim)}${marker}`);
    if (evidence) {
      footnotes.push(`[^${noteId}]: ${evidence.docId}:${evidence.location} — ${escapeInline(evidence.snippet)}`);
    }
  });

  if (includeRetrievalLog && pack.retrievalLog.candidates.length > 0) {
    lines.push('');
    lines.push(`**Retrieval log** (top ${pack.retrievalLog.topK})\n`);
    lines.push('| Document | Line | Score |');
    lines.push('|----------|------|-------|');
    for (const candidate of pack.retrievalLog.candidates) {
      lines.push(`| ${candidate.docId} | ${candidate.location} | ${candidate.score.toFixed(2)} |`);
    }
  }

  if (footnotes.length > 0) {
    lines.push('');
    lines.push(...footnotes);
  }

  return lines.join('\n');
}

function getLabelBadge(label: VerdictLabel): string {
  switch (label) {
    case 'SUPPORTED': return '[SUPPORTED]';
    case 'NOT_SUPPORTED': return '[NOT SUPPORTED]';
    case 'INSUFFICIENT': return '[INSUFFICIENT]';
  }
}

function escapeInline(text: string): string {
  return text.replace(/([\\`*_[\]|])/g, '\\$1');
}
