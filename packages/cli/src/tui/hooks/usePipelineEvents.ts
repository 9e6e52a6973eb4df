import { useState, useEffect } from 'react';
import type {
  ClaimVerifiedEvent,
  IndexBuiltEvent,
  PipelineCompleteEvent,
  PipelineErrorEvent,
  QuestionCompleteEvent,
  QuestionStartEvent,
} from '@claimtrace/core';
import { addLabel, emptyCounts, type ClaimEntry, type RunProps, type RunState } from '../types.js';

/** Claims kept in the live feed. */
export const FEED_SIZE = 5;

export function usePipelineEvents({ docsDir, questions, claimsByQid, pipeline }: RunProps): RunState {
  const [state, setState] = useState<RunState>(() => ({
    docsDir,
    questions: questions.map(q => ({
      qid: q.qid,
      status: 'pending' as const,
      claimCount: claimsByQid.get(q.qid)?.length ?? 0,
      verified: 0,
      labels: emptyCounts(),
    })),
    currentIndex: 0,
    tally: emptyCounts(),
    recentClaims: [],
    done: false,
  }));

  useEffect(() => {
    if (!pipeline) return;

    const questionIndexMap = new Map(questions.map((q, i) => [q.qid, i]));

    const onIndexBuilt = (event: IndexBuiltEvent) => {
      setState(prev => ({ ...prev, lineCount: event.lineCount }));
    };

    const onQuestionStart = (event: QuestionStartEvent) => {
      const idx = questionIndexMap.get(event.qid);
      if (idx === undefined) return;

      setState(prev => {
        const next = [...prev.questions];
        next[idx] = { ...next[idx], status: 'running', claimCount: event.claimCount };
        return { ...prev, questions: next, currentIndex: idx };
      });
    };

    const onClaimVerified = (event: ClaimVerifiedEvent) => {
      const idx = questionIndexMap.get(event.qid);
      if (idx === undefined) return;

      const { result, rule } = event.verification;
      const evidence = result.evidence[0];
      const entry: ClaimEntry = {
        qid: event.qid,
        claim: result.claim,
        label: result.label,
        rule,
        citation: evidence ? `${evidence.docId}:${evidence.location}` : undefined,
      };

      setState(prev => {
        const next = [...prev.questions];
        next[idx] = {
          ...next[idx],
          verified: next[idx].verified + 1,
          labels: addLabel(next[idx].labels, result.label),
        };
        return {
          ...prev,
          questions: next,
          tally: addLabel(prev.tally, result.label),
          recentClaims: [...prev.recentClaims, entry].slice(-FEED_SIZE),
        };
      });
    };

    const onQuestionComplete = (event: QuestionCompleteEvent) => {
      const idx = questionIndexMap.get(event.qid);
      if (idx === undefined) return;

      setState(prev => {
        const next = [...prev.questions];
        next[idx] = { ...next[idx], status: 'done', elapsedMs: event.durationMs };
        return { ...prev, questions: next };
      });
    };

    const onPipelineComplete = (event: PipelineCompleteEvent) => {
      setState(prev => ({ ...prev, done: true, totalDurationMs: event.totalDurationMs }));
    };

    const onPipelineError = (event: PipelineErrorEvent) => {
      const idx = event.qid === undefined ? undefined : questionIndexMap.get(event.qid);

      setState(prev => {
        const next = [...prev.questions];
        if (idx !== undefined) {
          next[idx] = { ...next[idx], status: 'error' };
        }
        const where = event.qid === undefined ? '' : `Question "${event.qid}" failed: `;
        return { ...prev, questions: next, error: `${where}${event.error.message}`, done: true };
      });
    };

    pipeline.on('index:built', onIndexBuilt);
    pipeline.on('question:start', onQuestionStart);
    pipeline.on('claim:verified', onClaimVerified);
    pipeline.on('question:complete', onQuestionComplete);
    pipeline.on('pipeline:complete', onPipelineComplete);
    pipeline.on('pipeline:error', onPipelineError);

    // pipeline:error usually sets the message first.
    pipeline.run().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      setState(prev => ({ ...prev, error: prev.error ?? message, done: true }));
    });

    return () => {
      pipeline.off('index:built', onIndexBuilt);
      pipeline.off('question:start', onQuestionStart);
      pipeline.off('claim:verified', onClaimVerified);
      pipeline.off('question:complete', onQuestionComplete);
      pipeline.off('pipeline:complete', onPipelineComplete);
      pipeline.off('pipeline:error', onPipelineError);
    };
  }, [pipeline]);

  return state;
}
