#!/usr/bin/env node
/**
 * crm-extract - extract contact-center REST API collections into CSV tables.
 */

import { Command } from 'commander';
import { runCommand } from './commands/run';
import { listFieldsCommand } from './commands/list-fields';
import { endpointsCommand } from './commands/endpoints';

// eslint-disable-next-line @typescript-eslint/no-require-imports
const pkg: { version: string } = require('../../package.json');

const program = new Command();

program
  .name('crm-extract')
  .description('Extract contact-center REST API data into CSV tables')
  .version(pkg.version)
  .option('-c, --config <path>', 'Run configuration JSON (default: <data-dir>/config.json)')
  .option('-d, --data-dir <dir>', 'Data directory holding in/ and out/')
  .option('--definitions <path>', 'Endpoint definitions YAML');

program.addCommand(runCommand, { isDefault: true });
program.addCommand(listFieldsCommand);
program.addCommand(endpointsCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(2);
});
