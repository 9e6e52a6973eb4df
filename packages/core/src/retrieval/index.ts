export { tokenize, termSet } from './tokenizer.js';

export {
  BM25Index,
  DEFAULT_BM25_OPTIONS,
  type BM25Options,
} from './bm25.js';

export {
  LineRetriever,
  DEFAULT_TOP_K,
  type Retriever,
  type RetrievalHit,
} from './retriever.js';
