import { EventEmitter } from 'eventemitter3';
import { LineStore } from '../corpus/loader.js';
import type { DocumentLine, Qid, QuestionRecord } from '../corpus/types.js';
import type { BM25Options } from '../retrieval/bm25.js';
import { LineRetriever } from '../retrieval/retriever.js';
import { PackAssembler } from '../verification/assembler.js';
import type { VerifierConfig } from '../verification/config.js';
import { computeSummary } from '../verification/reporter.js';
import type { ClaimVerification, Pack, VerificationSummary } from '../verification/types.js';
import { ClaimVerifier } from '../verification/verifier.js';

// ---------------------------------------------------------------------------
// Pipeline event types
// ---------------------------------------------------------------------------

export interface IndexBuiltEvent {
  lineCount: number;
  durationMs: number;
}

export interface QuestionStartEvent {
  qid: Qid;
  question: string;
  claimCount: number;
  /** 0-based position of the question in run order. */
  index: number;
  total: number;
}

export interface ClaimVerifiedEvent {
  qid: Qid;
  claimIndex: number;
  verification: ClaimVerification;
}

export interface QuestionCompleteEvent {
  qid: Qid;
  pack: Pack;
  durationMs: number;
}

export interface PipelineCompleteEvent {
  packs: Pack[];
  summary: VerificationSummary;
  totalDurationMs: number;
}

export interface PipelineErrorEvent {
  error: Error;
  qid?: Qid;
}

export interface PipelineEvents {
  'index:built': (event: IndexBuiltEvent) => void;
  'question:start': (event: QuestionStartEvent) => void;
  'claim:verified': (event: ClaimVerifiedEvent) => void;
  'question:complete': (event: QuestionCompleteEvent) => void;
  'pipeline:complete': (event: PipelineCompleteEvent) => void;
  'pipeline:error': (event: PipelineErrorEvent) => void;
}

// ---------------------------------------------------------------------------
// Pipeline context
// ---------------------------------------------------------------------------

export interface PipelineContext {
  corpus: LineStore | readonly DocumentLine[];
  questions: readonly QuestionRecord[];
  claimsByQid: ReadonlyMap<Qid, readonly string[]>;
  verifier?: Partial<VerifierConfig>;
  bm25?: BM25Options;
}

/** Numeric qids sort numerically and before string qids; strings sort by code unit. */
export function compareQids(a: Qid, b: Qid): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Distinct questions in ascending qid order; a later record for a qid wins. */
export function orderQuestions(questions: readonly QuestionRecord[]): QuestionRecord[] {
  const byQid = new Map(questions.map(q => [q.qid, q.question]));
  return [...byQid.keys()].sort(compareQids).map(qid => ({ qid, question: byQid.get(qid) ?? '' }));
}

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

// ---------------------------------------------------------------------------
// Pipeline engine
// ---------------------------------------------------------------------------

export class VerificationPipeline extends EventEmitter<PipelineEvents> {
  private readonly context: PipelineContext;

  constructor(context: PipelineContext) {
    super();
    this.context = context;
  }

  async run(): Promise<PipelineCompleteEvent> {
    const pipelineStart = Date.now();
    let currentQid: Qid | undefined;

    try {
      const { corpus, claimsByQid } = this.context;
      const lines = corpus instanceof LineStore ? corpus.lines : corpus;

      const indexStart = Date.now();
      const retriever = new LineRetriever(lines, this.context.bm25);
      this.emit('index:built', { lineCount: retriever.size, durationMs: Date.now() - indexStart });

      const assembler = new PackAssembler(new ClaimVerifier(retriever, this.context.verifier));
      const questions = orderQuestions(this.context.questions);
      const packs: Pack[] = [];

      for (let i = 0; i < questions.length; i++) {
        const { qid, question } = questions[i];
        currentQid = qid;
        const claims = claimsByQid.get(qid) ?? [];

        this.emit('question:start', {
          qid,
          question,
          claimCount: claims.length,
          index: i,
          total: questions.length,
        });

        const questionStart = Date.now();
        const pack = assembler.assemble(qid, question, claims, {
          onClaim: (verification, claimIndex) => {
            this.emit('claim:verified', { qid, claimIndex, verification });
          },
        });
        packs.push(pack);

        this.emit('question:complete', { qid, pack, durationMs: Date.now() - questionStart });
        currentQid = undefined;

        // Let renderers repaint between questions.
        await yieldToEventLoop();
      }

      const completeEvent: PipelineCompleteEvent = {
        packs,
        summary: computeSummary(packs),
        totalDurationMs: Date.now() - pipelineStart,
      };

      this.emit('pipeline:complete', completeEvent);
      return completeEvent;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.emit('pipeline:error', { error, qid: currentQid });
      throw err;
    }
  }
}
