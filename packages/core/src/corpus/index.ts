// Types
export {
  type DocumentLine,
  type QuestionRecord,
  type ClaimsRecord,
  type Qid,
} from './types.js';

// Documents
export {
  CorpusLoadError,
  LineStore,
  LINE_PATTERN,
  parseDocument,
  loadDocuments,
  type LoadDocumentsOptions,
} from './loader.js';

// JSONL records
export {
  JsonlParseError,
  RecordValidationError,
  QuestionRecordSchema,
  ClaimsRecordSchema,
  parseJsonl,
  readJsonl,
  validateRecords,
  loadQuestions,
  loadClaims,
  indexClaims,
  type JsonlEntry,
} from './jsonl.js';
