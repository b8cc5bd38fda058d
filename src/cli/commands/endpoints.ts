import chalk from 'chalk';
import { Command } from 'commander';
import { config } from '../../config/env';
import { loadEndpointDefinitions } from '../../config/endpoint-definitions';
import { GlobalOptions, exitWithError } from '../options';

export const endpointsCommand = new Command('endpoints')
  .description('Show the endpoint definition table')
  .option('--json', 'Output raw JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    try {
      const { definitions: definitionsPath } = command.optsWithGlobals<GlobalOptions>();
      const definitions = await loadEndpointDefinitions(definitionsPath ?? config.paths.definitionsPath);
      const specs = [...definitions.endpoints.values()];

      if (options.json) {
        console.log(JSON.stringify({ identitySource: definitions.identitySource, endpoints: specs }, null, 2));
        return;
      }

      for (const spec of specs) {
        const marker = spec.name === definitions.identitySource ? chalk.magenta(' [identity]') : '';
        const parent = spec.parentTable ? chalk.gray(` <- ${spec.parentTable}.${spec.parentIdField}`) : '';
        const keys = spec.primaryKeys.length > 0 ? chalk.cyan(` keys: ${spec.primaryKeys.join(', ')}`) : '';
        const dateField = spec.dateFilterField ? chalk.gray(` date: ${spec.dateFilterField}`) : '';
        console.log(`${chalk.bold(spec.name)}${marker}${parent}${keys}${dateField}`);
      }
    } catch (error) {
      exitWithError(error);
    }
  });
