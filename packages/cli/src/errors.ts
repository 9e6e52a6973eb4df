import chalk from 'chalk';
import { CorpusLoadError } from '@claimtrace/core';
import { ConfigError } from './config/index.js';

/** Errors a command reports to the user instead of crashing on. */
export function isReportableError(err: unknown): err is Error {
  return err instanceof CorpusLoadError || err instanceof ConfigError;
}

/**
 * Print a known error in red (or as `{ "error": ... }` on stderr in JSON mode)
 * and set a failing exit code. Anything else is rethrown.
 */
export function reportCommandError(err: unknown, options: { json?: boolean } = {}): void {
  if (!isReportableError(err)) {
    throw err;
  }

  if (options.json) {
    console.error(JSON.stringify({ error: err.message }));
  } else {
    const prefix = err instanceof ConfigError ? 'Config error' : 'Input error';
    console.error(chalk.red(`${prefix}: ${err.message}`));
  }
  process.exitCode = 1;
}
