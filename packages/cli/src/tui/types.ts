import type { ClassificationRule, Qid, QuestionRecord, VerdictLabel, VerificationPipeline } from '@claimtrace/core';

export type { VerificationPipeline };

export type QuestionStatus = 'pending' | 'running' | 'done' | 'error';

export interface LabelCounts {
  supported: number;
  notSupported: number;
  insufficient: number;
}

export interface QuestionState {
  qid: Qid;
  status: QuestionStatus;
  claimCount: number;
  verified: number;
  labels: LabelCounts;
  elapsedMs?: number;
}

/** One verified claim, as shown in the live feed. */
export interface ClaimEntry {
  qid: Qid;
  claim: string;
  label: VerdictLabel;
  rule: ClassificationRule;
  /** `docId:location` of the evidence line, when there is one. */
  citation?: string;
}

export interface RunState {
  docsDir: string;
  lineCount?: number;
  questions: QuestionState[];
  currentIndex: number;
  tally: LabelCounts;
  recentClaims: ClaimEntry[];
  done: boolean;
  error?: string;
  totalDurationMs?: number;
}

export interface RunProps {
  docsDir: string;
  /** Questions in run order. */
  questions: QuestionRecord[];
  claimsByQid: ReadonlyMap<Qid, readonly string[]>;
  pipeline?: VerificationPipeline;
  verbose?: boolean;
}

export function emptyCounts(): LabelCounts {
  return { supported: 0, notSupported: 0, insufficient: 0 };
}

export function addLabel(counts: LabelCounts, label: VerdictLabel): LabelCounts {
  switch (label) {
    case 'SUPPORTED': return { ...counts, supported: counts.supported + 1 };
    case 'NOT_SUPPORTED': return { ...counts, notSupported: counts.notSupported + 1 };
    case 'INSUFFICIENT': return { ...counts, insufficient: counts.insufficient + 1 };
  }
}
