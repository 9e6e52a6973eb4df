import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfigWithMeta } from './config/index.js';
import { setConfig, type GlobalOptions } from './context.js';
import { registerRunCommand } from './commands/run.js';
import { registerEvalCommand } from './commands/eval.js';
import { registerConfigCommand } from './commands/config.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('claimtrace')
    .description('Verify atomic claims against line-numbered reference documents')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Machine-readable JSON output')
    .option('--no-tui', 'Force headless mode (no TUI)')
    .option('-c, --config <path>', 'Path to config file');

  registerRunCommand(program);
  registerEvalCommand(program);
  registerConfigCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program);

    // Skip config loading for 'config init'
    if (chain[0] === 'config' && chain[1] === 'init') {
      return;
    }

    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: opts.config });

    if (!configFileExists && envKeysUsed.length > 0 && !opts.json) {
      const keys = envKeysUsed.join(', ');
      console.error(chalk.cyan(`  Using ${keys} from environment.`));
      console.error(chalk.dim(`  Run "claimtrace config init" to create a config file for more options.\n`));
    }

    setConfig(config);
  });

  return program;
}

export function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}
