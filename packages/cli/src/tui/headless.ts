import chalk from 'chalk';
import ora from 'ora';
import type {
  ClaimVerifiedEvent,
  IndexBuiltEvent,
  PipelineCompleteEvent,
  Qid,
  QuestionCompleteEvent,
  QuestionStartEvent,
} from '@claimtrace/core';
import type { RunProps, VerificationPipeline } from './types.js';
import { formatVerdictLine } from '../stats.js';

export async function runHeadless(props: RunProps & { pipeline: VerificationPipeline }): Promise<PipelineCompleteEvent> {
  const { docsDir, questions, pipeline, verbose } = props;

  console.log('');
  console.log(chalk.cyan.bold('claimtrace') + chalk.dim(' | headless mode'));
  console.log(`Docs: ${chalk.white(docsDir)}`);
  console.log(`Questions: ${chalk.green.bold(String(questions.length))}`);
  console.log('');

  let currentQid: Qid | undefined;
  let activeSpinner = ora();

  pipeline.on('index:built', (event: IndexBuiltEvent) => {
    console.log(chalk.dim(`  Indexed ${event.lineCount} lines in ${event.durationMs}ms`));
  });

  pipeline.on('question:start', (event: QuestionStartEvent) => {
    currentQid = event.qid;
    activeSpinner = ora({
      text: `${chalk.bold(String(event.qid))} ${chalk.dim(`(${event.index + 1}/${event.total}, ${event.claimCount} claims)`)}`,
      prefixText: chalk.dim(' '),
    }).start();
  });

  pipeline.on('claim:verified', (event: ClaimVerifiedEvent) => {
    if (verbose) {
      activeSpinner.text = `${chalk.bold(String(event.qid))} ${chalk.dim('-')} ${formatVerdictLine(event.verification)}`;
    }
  });

  pipeline.on('question:complete', (event: QuestionCompleteEvent) => {
    const labels = event.pack.claims.map(c => c.label);
    const supported = labels.filter(l => l === 'SUPPORTED').length;
    const notSupported = labels.filter(l => l === 'NOT_SUPPORTED').length;
    const insufficient = labels.filter(l => l === 'INSUFFICIENT').length;

    activeSpinner.succeed(
      `${chalk.bold(String(event.qid))}` +
      chalk.dim(`  ${event.durationMs}ms`) +
      `  ${chalk.green(`${supported}S`)} ${chalk.red(`${notSupported}N`)} ${chalk.yellow(`${insufficient}I`)}`,
    );

    if (verbose) {
      for (const result of event.pack.claims) {
        const evidence = result.evidence[0];
        const cite = evidence ? chalk.dim(` ${evidence.docId}:${evidence.location}`) : '';
        console.log(chalk.dim('    ') + `[${result.label}] ${result.claim}${cite}`);
      }
    }
  });

  try {
    const result = await pipeline.run();

    console.log('');
    console.log(chalk.green.bold('\u2713 Verification complete'));
    console.log(chalk.dim(`  Questions: ${result.summary.totalPacks}  Claims: ${result.summary.totalClaims}`));
    console.log(chalk.dim(`  Duration: ${result.totalDurationMs}ms`));
    console.log('');
    return result;
  } catch (err) {
    activeSpinner.fail(chalk.red('Pipeline failed'));
    console.log('');
    const message = err instanceof Error ? err.message : String(err);
    console.log(chalk.red.bold('\u2717 Verification failed'));
    console.log(chalk.red(`  ${message}`));
    if (currentQid !== undefined) {
      console.log(chalk.dim(`  Failed during question: ${currentQid}`));
    }
    console.log('');
    throw err;
  }
}
