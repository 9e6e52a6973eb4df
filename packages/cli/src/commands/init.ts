import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, resolve } from 'path';

export interface InitCommandOptions {
  configPath?: string;
  homeDir?: string;
  logger?: (...args: unknown[]) => void;
}

function expandTilde(pathValue: string, homeDirectory: string): string {
  if (pathValue === '~') {
    return homeDirectory;
  }
  if (pathValue.startsWith('~/')) {
    return resolve(homeDirectory, pathValue.slice(2));
  }
  return pathValue;
}

function resolveConfigPath(configPath: string | undefined, homeDirectory: string): string {
  if (configPath) {
    return expandTilde(configPath, homeDirectory);
  }
  return resolve(homeDirectory, '.claimtrace', 'config.yaml');
}

export const CONFIG_TEMPLATE = `# claimtrace configuration

# BM25 retrieval over document lines
retrieval:
  top_k: 10          # candidate lines retrieved per claim
  k1: 1.5            # term-frequency saturation
  b: 0.75            # length normalization (0..1)
  epsilon: 0.25      # floor for terms found in most lines

# Claim verification
verification:
  min_score: 3.0             # candidates scoring below this are never judged
  prohibition_overlap: 0.3   # overlap needed for "must not" evidence to refute
  support_overlap: 0.4       # overlap needed to support (or refute on polarity)
  log_limit: 10              # candidates kept in each retrieval log
  negation_words: [not, never, no, cannot, prohibited, must not, should not]

# Input paths (flags override; CLAIMTRACE_DOCS, CLAIMTRACE_QUESTIONS and
# CLAIMTRACE_CLAIMS fill in what is left unset)
inputs:
  # docs: ./docs
  # questions: ./questions.jsonl
  # claims: ./claims.jsonl

# Output (CLAIMTRACE_OUT fills in an unset dir)
output:
  dir: ./outputs
  report: false      # also write report.md
`;

export async function initCommand(options: InitCommandOptions = {}): Promise<void> {
  const log = options.logger ?? console.log;
  const homeDirectory = options.homeDir ?? homedir();

  const configPath = resolveConfigPath(options.configPath, homeDirectory);
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    log(chalk.green('Created directory:'), configDir);
  }

  if (existsSync(configPath)) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Run with --config <path> to use a different location.'));
    return;
  }

  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath);
  log('  2. Point inputs at your documents, questions and claims');
  log('  3. Run', chalk.green('claimtrace run --report'));
}
