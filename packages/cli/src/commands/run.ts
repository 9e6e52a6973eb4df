import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { resolve } from 'path';
import {
  VerificationPipeline,
  loadClaims,
  loadDocuments,
  loadQuestions,
  orderQuestions,
  writeOutput,
  type PipelineCompleteEvent,
  type VerifierConfig,
  type BM25Options,
} from '@claimtrace/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { ConfigError, expandTilde, type Config } from '../config/index.js';
import { reportCommandError } from '../errors.js';
import { formatClaimsSummary } from '../stats.js';
import { renderRun, runHeadless, type RunProps } from '../tui/index.js';

export interface RunOptions {
  docs?: string;
  questions?: string;
  claims?: string;
  out?: string;
  topK?: number;
  minScore?: number;
  report?: boolean;
}

export interface RunSettings {
  docsDir: string;
  questionsPath: string;
  claimsPath: string;
  outputDir: string;
  report: boolean;
  verifier: Partial<VerifierConfig>;
  bm25: BM25Options;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative number.');
  }
  return parsed;
}

function requirePath(value: string | undefined, flag: string, configKey: string): string {
  if (!value) {
    throw new ConfigError(`Missing ${flag}: pass ${flag} or set ${configKey} in the config file`);
  }
  return resolve(expandTilde(value));
}

/** Merge command flags over the loaded config. Flags win. */
export function resolveRunSettings(options: RunOptions, config: Config): RunSettings {
  const { retrieval, verification } = config;

  return {
    docsDir: requirePath(options.docs ?? config.inputs.docs, '--docs', 'inputs.docs'),
    questionsPath: requirePath(options.questions ?? config.inputs.questions, '--questions', 'inputs.questions'),
    claimsPath: requirePath(options.claims ?? config.inputs.claims, '--claims', 'inputs.claims'),
    outputDir: resolve(expandTilde(options.out ?? config.output.dir)),
    report: options.report ?? config.output.report,
    verifier: {
      topK: options.topK ?? retrieval.top_k,
      minScore: options.minScore ?? verification.min_score,
      prohibitionOverlap: verification.prohibition_overlap,
      supportOverlap: verification.support_overlap,
      logLimit: verification.log_limit,
      negationWords: [...verification.negation_words],
    },
    bm25: {
      k1: retrieval.k1,
      b: retrieval.b,
      epsilon: retrieval.epsilon,
    },
  };
}

export async function executeRun(settings: RunSettings, globalOpts: GlobalOptions): Promise<void> {
  const corpus = loadDocuments(settings.docsDir);
  const questions = orderQuestions(loadQuestions(settings.questionsPath));
  const claimsByQid = loadClaims(settings.claimsPath);

  const pipeline = new VerificationPipeline({
    corpus,
    questions,
    claimsByQid,
    verifier: settings.verifier,
    bm25: settings.bm25,
  });

  let result: PipelineCompleteEvent;

  if (globalOpts.json) {
    result = await pipeline.run();
  } else {
    const runProps: RunProps & { pipeline: VerificationPipeline } = {
      docsDir: settings.docsDir,
      questions,
      claimsByQid,
      pipeline,
      verbose: globalOpts.verbose,
    };
    const useTui = process.stdout.isTTY === true && globalOpts.tui !== false;
    result = useTui ? await renderRun(runProps) : await runHeadless(runProps);
  }

  const written = writeOutput({
    packs: result.packs,
    outputDir: settings.outputDir,
    report: settings.report,
  });

  if (globalOpts.json) {
    console.log(JSON.stringify({
      command: 'run',
      packsPath: written.packsPath,
      reportPath: written.reportPath,
      totalDurationMs: result.totalDurationMs,
      summary: result.summary,
    }, null, 2));
    return;
  }

  console.log(chalk.green(`Output written to ${chalk.bold(written.packsPath)}`));
  if (written.reportPath) {
    console.log(chalk.green(`Report written to ${chalk.bold(written.reportPath)}`));
  }
  console.log(chalk.dim(`Total packs: ${result.packs.length}`));
  console.log('');
  for (const line of formatClaimsSummary(result.summary)) {
    console.log(line);
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Verify claims against a document corpus and write verification packs')
    .option('--docs <dir>', 'Directory of line-labelled .txt documents')
    .option('--questions <file>', 'Questions JSONL ({qid, question})')
    .option('--claims <file>', 'Claims JSONL ({qid, claims})')
    .option('--out <dir>', 'Output directory for packs.jsonl')
    .option('--top-k <n>', 'Candidate lines retrieved per claim', parsePositiveInt)
    .option('--min-score <n>', 'Lowest BM25 score a candidate needs to be judged', parseNonNegative)
    .option('--report', 'Also write report.md')
    .action(async (options: RunOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      try {
        const settings = resolveRunSettings(options, getConfig());
        await executeRun(settings, globalOpts);
      } catch (err) {
        reportCommandError(err, { json: globalOpts.json });
      }
    });
}
