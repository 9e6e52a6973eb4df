import { readFileSync } from 'node:fs';
import { z, type ZodIssue, type ZodType, type ZodTypeDef } from 'zod';
import { CorpusLoadError } from './loader.js';
import type { ClaimsRecord, Qid, QuestionRecord } from './types.js';

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class JsonlParseError extends CorpusLoadError {
  constructor(
    message: string,
    public readonly lineNumber: number,
    filePath?: string,
  ) {
    super(message, filePath);
    this.name = 'JsonlParseError';
  }
}

export class RecordValidationError extends CorpusLoadError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[],
    public readonly lineNumber: number,
    filePath?: string,
  ) {
    super(message, filePath);
    this.name = 'RecordValidationError';
  }
}

// ---------------------------------------------------------------------------
// Record schemas
// ---------------------------------------------------------------------------

const qidSchema = z.union([z.string(), z.number()]);

export const QuestionRecordSchema = z.object({
  qid: qidSchema,
  question: z.string(),
});

export const ClaimsRecordSchema = z.object({
  qid: qidSchema,
  claims: z.array(z.string()),
});

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

/** One parsed JSONL record with its 1-based line number. */
export interface JsonlEntry {
  lineNumber: number;
  value: unknown;
}

/** Parse JSONL text. Blank lines are skipped. */
export function parseJsonl(content: string, filePath?: string): JsonlEntry[] {
  const entries: JsonlEntry[] = [];
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    try {
      entries.push({ lineNumber: i + 1, value: JSON.parse(line) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const where = filePath ? `${filePath}:${i + 1}` : `line ${i + 1}`;
      throw new JsonlParseError(`Invalid JSON at ${where}: ${reason}`, i + 1, filePath);
    }
  }

  return entries;
}

/** Read and parse a JSONL file. */
export function readJsonl(filePath: string): JsonlEntry[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorpusLoadError(`Failed to read file: ${filePath} (${reason})`, filePath);
  }
  return parseJsonl(content, filePath);
}

/**
 * Validate every entry against a schema.
 * The first invalid record aborts the whole read.
 */
export function validateRecords<T>(
  entries: JsonlEntry[],
  schema: ZodType<T, ZodTypeDef, unknown>,
  filePath?: string,
): T[] {
  return entries.map(({ lineNumber, value }) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
      const where = filePath ? `${filePath}:${lineNumber}` : `line ${lineNumber}`;
      throw new RecordValidationError(`Invalid record at ${where}: ${issues}`, result.error.issues, lineNumber, filePath);
    }
    return result.data;
  });
}

/** Load `{ qid, question }` records. */
export function loadQuestions(filePath: string): QuestionRecord[] {
  return validateRecords(readJsonl(filePath), QuestionRecordSchema, filePath);
}

/**
 * Load `{ qid, claims }` records into a map keyed by qid.
 * A later record for the same qid replaces an earlier one.
 */
export function loadClaims(filePath: string): Map<Qid, string[]> {
  return indexClaims(validateRecords(readJsonl(filePath), ClaimsRecordSchema, filePath));
}

/** Index claims records by qid; a later record replaces an earlier one. */
export function indexClaims(records: readonly ClaimsRecord[]): Map<Qid, string[]> {
  return new Map(records.map(record => [record.qid, record.claims]));
}
