import { readFileSync, readdirSync, statSync } from 'node:fs';
import { join, extname, basename } from 'node:path';
import type { DocumentLine } from './types.js';

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class CorpusLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
  ) {
    super(message);
    this.name = 'CorpusLoadError';
  }
}

// ---------------------------------------------------------------------------
// Line parsing
// ---------------------------------------------------------------------------

/** A content line: `L<digits>:` followed by non-empty text. */
export const LINE_PATTERN = /^(L\d+):\s*(.+)$/;

/**
 * Extract the labelled lines of one document.
 * Each raw line is trimmed first; lines that do not match {@link LINE_PATTERN} are skipped.
 */
export function parseDocument(docId: string, content: string): DocumentLine[] {
  const lines: DocumentLine[] = [];

  for (const raw of content.split(/\r?\n/)) {
    const match = LINE_PATTERN.exec(raw.trim());
    if (!match) continue;
    lines.push({ docId, lineLabel: match[1], text: match[2] });
  }

  return lines;
}

// ---------------------------------------------------------------------------
// LineStore
// ---------------------------------------------------------------------------

/**
 * Read-only store of every labelled line in the corpus, in document order
 * (documents sorted by file name, lines in file order).
 */
export class LineStore {
  private readonly documents: Map<string, DocumentLine[]>;
  private readonly allLines: DocumentLine[];

  constructor(documents: Map<string, DocumentLine[]> = new Map()) {
    this.documents = documents;
    this.allLines = [...documents.values()].flat();
  }

  static fromLines(lines: DocumentLine[]): LineStore {
    const documents = new Map<string, DocumentLine[]>();
    for (const line of lines) {
      const docLines = documents.get(line.docId);
      if (docLines) {
        docLines.push(line);
      } else {
        documents.set(line.docId, [line]);
      }
    }
    return new LineStore(documents);
  }

  get lines(): readonly DocumentLine[] {
    return this.allLines;
  }

  get documentCount(): number {
    return this.documents.size;
  }

  get documentIds(): string[] {
    return [...this.documents.keys()];
  }

  getDocument(docId: string): readonly DocumentLine[] | undefined {
    return this.documents.get(docId);
  }

  getLine(docId: string, lineLabel: string): DocumentLine | undefined {
    return this.documents.get(docId)?.find(line => line.lineLabel === lineLabel);
  }
}

// ---------------------------------------------------------------------------
// loadDocuments — scan a directory of .txt documents
// ---------------------------------------------------------------------------

export interface LoadDocumentsOptions {
  /** File extension of documents to load. Default: '.txt'. */
  extension?: string;
}

function isFile(filePath: string): boolean {
  try {
    return statSync(filePath).isFile();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorpusLoadError(`Failed to read document: ${filePath} (${reason})`, filePath);
  }
}

/**
 * Load every document in `docsDir` into a {@link LineStore}.
 * A missing or unreadable directory or file is fatal.
 */
export function loadDocuments(docsDir: string, options: LoadDocumentsOptions = {}): LineStore {
  const { extension = '.txt' } = options;

  let entries: string[];
  try {
    entries = readdirSync(docsDir);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorpusLoadError(`Failed to read documents directory: ${docsDir} (${reason})`, docsDir);
  }

  const files = entries
    .filter(name => extname(name) === extension)
    .filter(name => isFile(join(docsDir, name)))
    .sort();

  const documents = new Map<string, DocumentLine[]>();
  for (const file of files) {
    const filePath = join(docsDir, file);
    const docId = basename(file, extension);

    let content: string;
    try {
      content = readFileSync(filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CorpusLoadError(`Failed to read document: ${filePath} (${reason})`, filePath);
    }

    documents.set(docId, parseDocument(docId, content));
  }

  return new LineStore(documents);
}
