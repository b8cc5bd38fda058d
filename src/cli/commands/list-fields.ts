import chalk from 'chalk';
import { Command } from 'commander';
import { listFields } from '../../services/run-extraction';
import { exitWithError, runOptionsFrom } from '../options';

export const listFieldsCommand = new Command('list-fields')
  .description('List the fields of one sample record per configured endpoint')
  .option('--json', 'Output raw JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    try {
      const fields = await listFields(runOptionsFrom(command));
      if (options.json) {
        console.log(JSON.stringify(fields, null, 2));
        return;
      }

      for (const [endpoint, names] of Object.entries(fields)) {
        console.log(chalk.bold(`\n${endpoint}`) + chalk.gray(` (${names.length})`));
        if (names.length === 0) {
          console.log(chalk.yellow('  no fields found'));
        }
        for (const name of names) {
          console.log(`  ${name}`);
        }
      }
    } catch (error) {
      exitWithError(error);
    }
  });
