/**
 * BM25 Okapi ranking over a static corpus of token lists.
 *
 *   idf(q)   = ln(N - n(q) + 0.5) - ln(n(q) + 0.5)
 *   score(D) = Σ idf(q) · tf(q,D)·(k1+1) / (tf(q,D) + k1·(1 - b + b·|D|/avgdl))
 *
 * Terms whose idf is negative (present in more than half the corpus) are
 * floored to `epsilon · averageIdf`. Duplicate query tokens are scored once
 * per occurrence.
 */

export interface BM25Options {
  /** Term-frequency saturation. Default: 1.5. */
  k1?: number;
  /** Length normalization. Default: 0.75. */
  b?: number;
  /** Fraction of the average idf assigned to negative-idf terms. Default: 0.25. */
  epsilon?: number;
}

export const DEFAULT_BM25_OPTIONS: Required<BM25Options> = {
  k1: 1.5,
  b: 0.75,
  epsilon: 0.25,
};

export class BM25Index {
  private readonly k1: number;
  private readonly b: number;
  private readonly epsilon: number;
  private readonly termFreqs: Map<string, number>[];
  private readonly docLengths: number[];
  private readonly avgDocLength: number;
  private readonly idf = new Map<string, number>();

  constructor(corpus: string[][], options: BM25Options = {}) {
    const { k1, b, epsilon } = { ...DEFAULT_BM25_OPTIONS, ...options };
    this.k1 = k1;
    this.b = b;
    this.epsilon = epsilon;

    this.termFreqs = corpus.map(tokens => {
      const freqs = new Map<string, number>();
      for (const token of tokens) {
        freqs.set(token, (freqs.get(token) ?? 0) + 1);
      }
      return freqs;
    });
    this.docLengths = corpus.map(tokens => tokens.length);

    const totalLength = this.docLengths.reduce((sum, len) => sum + len, 0);
    this.avgDocLength = corpus.length > 0 ? totalLength / corpus.length : 0;

    this.computeIdf();
  }

  get size(): number {
    return this.termFreqs.length;
  }

  /** Inverse document frequency of a term, 0 for a term not in the corpus. */
  idfOf(term: string): number {
    return this.idf.get(term) ?? 0;
  }

  /** Score every document against the query tokens, in corpus order. */
  scores(queryTokens: string[]): number[] {
    const scores = new Array<number>(this.size).fill(0);
    if (this.avgDocLength === 0) return scores;

    for (const term of queryTokens) {
      const idf = this.idfOf(term);
      if (idf === 0) continue;

      for (let i = 0; i < this.size; i++) {
        const tf = this.termFreqs[i].get(term) ?? 0;
        if (tf === 0) continue;
        const norm = this.k1 * (1 - this.b + this.b * this.docLengths[i] / this.avgDocLength);
        scores[i] += idf * (tf * (this.k1 + 1)) / (tf + norm);
      }
    }

    return scores;
  }

  private computeIdf(): void {
    const docFreq = new Map<string, number>();
    for (const freqs of this.termFreqs) {
      for (const term of freqs.keys()) {
        docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
      }
    }

    const corpusSize = this.size;
    const negative: string[] = [];
    let idfSum = 0;

    for (const [term, freq] of docFreq) {
      const idf = Math.log(corpusSize - freq + 0.5) - Math.log(freq + 0.5);
      this.idf.set(term, idf);
      idfSum += idf;
      if (idf < 0) negative.push(term);
    }

    const averageIdf = docFreq.size > 0 ? idfSum / docFreq.size : 0;
    const floor = this.epsilon * averageIdf;
    for (const term of negative) {
      this.idf.set(term, floor);
    }
  }
}
