import chalk from 'chalk';
import { Command } from 'commander';
import { AppError } from '../utils/errors';
import { config } from '../config/env';
import type { RunOptions } from '../services/run-extraction';

export interface GlobalOptions {
  config?: string;
  dataDir?: string;
  definitions?: string;
}

export function runOptionsFrom(command: Command): RunOptions {
  const options = command.optsWithGlobals<GlobalOptions>();
  return {
    dataDir: options.dataDir ?? config.paths.dataDir,
    configPath: options.config,
    definitionsPath: options.definitions
  };
}

/**
 * Report a failed command and exit: 1 for user-facing errors, 2 for anything else
 */
export function exitWithError(error: unknown): never {
  if (error instanceof AppError) {
    console.error(chalk.red(`\nError [${error.code}]: ${error.message}`));
    process.exit(1);
  }

  console.error(chalk.red('\nUnexpected error:'), error instanceof Error ? error.stack ?? error.message : error);
  process.exit(2);
}
