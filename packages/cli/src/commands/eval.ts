import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { CorpusLoadError, PACKS_FILENAME, evaluatePacks, readPacks, type EvaluationReport } from '@claimtrace/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { expandTilde } from '../config/index.js';
import { reportCommandError } from '../errors.js';
import { formatEvaluation } from '../stats.js';

/** The packs file to evaluate: the argument, or packs.jsonl in the configured output dir. */
export function resolvePacksPath(path: string | undefined, outputDir: string): string {
  return resolve(expandTilde(path ?? join(outputDir, PACKS_FILENAME)));
}

export function evaluatePacksFile(packsPath: string): EvaluationReport {
  if (!existsSync(packsPath)) {
    throw new CorpusLoadError(`File not found: ${packsPath}`, packsPath);
  }
  return evaluatePacks(readPacks(packsPath));
}

export function registerEvalCommand(program: Command): void {
  program
    .command('eval')
    .description('Print label statistics and quality checks for a packs file')
    .argument('[path]', 'Path to packs.jsonl (default: <output.dir>/packs.jsonl)')
    .action(async (path: string | undefined, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      try {
        const packsPath = resolvePacksPath(path, getConfig().output.dir);
        const report = evaluatePacksFile(packsPath);

        if (globalOpts.json) {
          console.log(JSON.stringify({ command: 'eval', packsPath, ...report }, null, 2));
          return;
        }

        for (const line of formatEvaluation(report)) {
          if (line.startsWith('  [!]')) {
            console.log(chalk.yellow(line));
          } else if (line.startsWith('  [OK]')) {
            console.log(chalk.green(line));
          } else {
            console.log(line);
          }
        }
      } catch (err) {
        reportCommandError(err, { json: globalOpts.json });
      }
    });
}
