export {
  type WriteOutputOptions,
  type WriteOutputResult,
  PACKS_FILENAME,
  REPORT_FILENAME,
  writeOutput,
} from './writer.js';

export {
  formatPacksMarkdown,
  type MarkdownFormatOptions,
} from './markdown.js';

export {
  EvidenceRecordSchema,
  ClaimRecordSchema,
  CandidateRecordSchema,
  PackRecordSchema,
  type PackRecord,
  serializePack,
  deserializePack,
  formatPacksJsonl,
  parsePacksJsonl,
  readPacks,
} from './jsonl.js';
