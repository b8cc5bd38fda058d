import chalk from 'chalk';
import { Command } from 'commander';
import { RunSummary, runExtraction } from '../../services/run-extraction';
import { exitWithError, runOptionsFrom } from '../options';

function printSummary(summary: RunSummary): void {
  console.log(chalk.bold(`\nExtraction ${summary.runId} (${summary.server})`));
  console.log(chalk.gray(`  ${summary.dateFrom} .. ${summary.dateTo}\n`));

  for (const outcome of summary.outcomes) {
    const rows = outcome.rowsWritten > 0 ? chalk.green(String(outcome.rowsWritten)) : chalk.yellow('0');
    const skipped = outcome.failedParentIds ? chalk.yellow(` (${outcome.failedParentIds} parent ids skipped)`) : '';
    console.log(`  ${outcome.endpoint.padEnd(24)} ${rows} rows${skipped}`);
  }

  if (summary.invalidIdentifiers > 0) {
    console.log(chalk.yellow(`\n  ${summary.invalidIdentifiers} identity records rejected for missing keys`));
  }
  console.log(chalk.gray(`\n  Finished in ${(summary.durationMs / 1000).toFixed(1)}s`));
}

export const runCommand = new Command('run')
  .description('Extract the configured endpoints into CSV tables')
  .option('--json', 'Print the run summary as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    try {
      const summary = await runExtraction(runOptionsFrom(command));
      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        printSummary(summary);
      }
    } catch (error) {
      exitWithError(error);
    }
  });
