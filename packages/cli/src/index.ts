#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './program.js';
import { ConfigError } from './config/index.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Config error: ${error.message}`));
    process.exitCode = 1;
  } else {
    throw error;
  }
}
