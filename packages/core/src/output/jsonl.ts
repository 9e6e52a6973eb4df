/**
 * Machine-readable pack output: one JSON record per line.
 *
 * Wire records use snake_case field names:
 *
 *   {qid, answer,
 *    claims: [{claim, label, evidence: [{doc_id, location, snippet}]}],
 *    retrieval_log: {top_k, candidates: [{doc_id, score, location}]}}
 */

import { z } from 'zod';
import { parseJsonl, readJsonl, validateRecords } from '../corpus/jsonl.js';
import { VERDICT_LABELS, type Pack } from '../verification/types.js';

export const EvidenceRecordSchema = z.object({
  doc_id: z.string(),
  location: z.string(),
  snippet: z.string(),
});

export const ClaimRecordSchema = z.object({
  claim: z.string(),
  label: z.enum(VERDICT_LABELS),
  evidence: z.array(EvidenceRecordSchema),
});

export const CandidateRecordSchema = z.object({
  doc_id: z.string(),
  score: z.number(),
  location: z.string(),
});

export const PackRecordSchema = z.object({
  qid: z.union([z.string(), z.number()]),
  answer: z.string(),
  claims: z.array(ClaimRecordSchema),
  retrieval_log: z.object({
    top_k: z.number().int(),
    candidates: z.array(CandidateRecordSchema),
  }),
});

export type PackRecord = z.infer<typeof PackRecordSchema>;

export function serializePack(pack: Pack): PackRecord {
  return {
    qid: pack.qid,
    answer: pack.answer,
    claims: pack.claims.map(c => ({
      claim: c.claim,
      label: c.label,
      evidence: c.evidence.map(e => ({
        doc_id: e.docId,
        location: e.location,
        snippet: e.snippet,
      })),
    })),
    retrieval_log: {
      top_k: pack.retrievalLog.topK,
      candidates: pack.retrievalLog.candidates.map(c => ({
        doc_id: c.docId,
        score: c.score,
        location: c.location,
      })),
    },
  };
}

export function deserializePack(record: PackRecord): Pack {
  return {
    qid: record.qid,
    answer: record.answer,
    claims: record.claims.map(c => ({
      claim: c.claim,
      label: c.label,
      evidence: c.evidence.map(e => ({
        docId: e.doc_id,
        location: e.location,
        snippet: e.snippet,
      })),
    })),
    retrievalLog: {
      topK: record.retrieval_log.top_k,
      candidates: record.retrieval_log.candidates.map(c => ({
        docId: c.doc_id,
        score: c.score,
        location: c.location,
      })),
    },
  };
}

/** Format packs as JSONL, one record per line, with a trailing newline. */
export function formatPacksJsonl(packs: Pack[]): string {
  return packs.map(pack => JSON.stringify(serializePack(pack)) + '\n').join('');
}

/** Parse JSONL pack text back into packs. */
export function parsePacksJsonl(content: string, filePath?: string): Pack[] {
  return validateRecords(parseJsonl(content, filePath), PackRecordSchema, filePath).map(deserializePack);
}

/** Read a packs.jsonl file. */
export function readPacks(filePath: string): Pack[] {
  return validateRecords(readJsonl(filePath), PackRecordSchema, filePath).map(deserializePack);
}
