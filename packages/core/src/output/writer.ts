import { writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { Pack } from '../verification/types.js';
import { formatPacksJsonl } from './jsonl.js';
import { formatPacksMarkdown } from './markdown.js';

export const PACKS_FILENAME = 'packs.jsonl';
export const REPORT_FILENAME = 'report.md';

export interface WriteOutputOptions {
  packs: Pack[];
  outputDir: string;
  /** Also write a markdown report beside the packs. Default: false. */
  report?: boolean;
  /** Title for the markdown report. */
  reportTitle?: string;
}

export interface WriteOutputResult {
  packsPath: string;
  reportPath?: string;
}

/**
 * Write packs.jsonl (and optionally report.md) into the output directory,
 * creating it when missing.
 */
export function writeOutput(options: WriteOutputOptions): WriteOutputResult {
  const { packs, outputDir, report = false } = options;

  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const packsPath = join(outputDir, PACKS_FILENAME);
  writeFileSync(packsPath, formatPacksJsonl(packs), 'utf-8');

  if (!report) {
    return { packsPath };
  }

  const reportPath = join(outputDir, REPORT_FILENAME);
  writeFileSync(reportPath, formatPacksMarkdown({ packs, title: options.reportTitle }), 'utf-8');

  return { packsPath, reportPath };
}
