/**
 * Corpus types.
 *
 * A corpus is a set of reference documents whose content lines carry an
 * `L<n>:` label. Only labelled lines take part in retrieval; each one is an
 * atomic unit of citation.
 */

/** One labelled line of a reference document. Immutable once loaded. */
export interface DocumentLine {
  /** Document identifier (the file stem, e.g. 'doc01'). */
  docId: string;
  /** Document-local label, e.g. 'L004'. Used only for citation. */
  lineLabel: string;
  /** Line content after the label. */
  text: string;
}

/** Question id as written in the input: a string or a JSON number. */
export type Qid = string | number;

/** A question to answer, keyed by qid. */
export interface QuestionRecord {
  qid: Qid;
  question: string;
}

/** The claims proposed as (partial) answers to one question. */
export interface ClaimsRecord {
  qid: Qid;
  claims: string[];
}
