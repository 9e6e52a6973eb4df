import type { DocumentLine } from '../corpus/types.js';
import { BM25Index, type BM25Options } from './bm25.js';
import { tokenize } from './tokenizer.js';

/** A ranked retrieval hit. */
export interface RetrievalHit {
  line: DocumentLine;
  score: number;
}

/**
 * Anything that can rank corpus lines against a query.
 * Results are sorted by score descending and hold strictly positive scores only.
 */
export interface Retriever {
  search(query: string, topK: number): RetrievalHit[];
}

/** Default retrieval depth. */
export const DEFAULT_TOP_K = 10;

/**
 * BM25 retriever over individual document lines.
 * The index is built once in the constructor and never mutated.
 */
export class LineRetriever implements Retriever {
  private readonly lines: readonly DocumentLine[];
  private readonly index: BM25Index;

  constructor(lines: readonly DocumentLine[], options: BM25Options = {}) {
    this.lines = lines;
    this.index = new BM25Index(lines.map(line => tokenize(line.text)), options);
  }

  get size(): number {
    return this.lines.length;
  }

  search(query: string, topK: number = DEFAULT_TOP_K): RetrievalHit[] {
    const scores = this.index.scores(tokenize(query));

    // Array.prototype.sort is stable: equal scores keep corpus order.
    const ranked = scores
      .map((score, idx) => ({ idx, score }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, topK));

    return ranked
      .filter(({ score }) => score > 0)
      .map(({ idx, score }) => ({ line: this.lines[idx], score }));
  }
}
