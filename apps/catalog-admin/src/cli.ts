/**
 * Catalog admin CLI
 */

import { Command, InvalidArgumentError } from 'commander';
import { createBrandsCommand, createCategoriesCommand, createProductsCommand } from './commands/entities';
import { createTableCommand } from './commands/table';
import type { GlobalOptions } from './context';
import {
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
  setOutputFormat,
  setQuietMode,
  setVerboseMode,
} from './utils/output';

function parseOutputFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Allowed: ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return value;
}

export function createCli(): Command {
  const program = new Command('catalog-admin')
    .description('Operate the product catalog table')
    .version('1.0.0')
    .option('-o, --output <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, parseOutputFormat)
    .option('-q, --quiet', 'Only print data and errors')
    .option('-v, --verbose', 'Print store diagnostics')
    .option('--table <name>', 'Table name (default: $DYNAMODB_TABLE)')
    .option('--region <region>', 'AWS region (default: $AWS_REGION)')
    .option('--endpoint <url>', 'DynamoDB endpoint, e.g. DynamoDB Local (default: $DYNAMODB_ENDPOINT)')
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      if (options.output && isOutputFormat(options.output)) {
        setOutputFormat(options.output);
      }
      setQuietMode(options.quiet ?? false);
      setVerboseMode(options.verbose ?? false);
    });

  program.addCommand(createTableCommand());
  program.addCommand(createBrandsCommand());
  program.addCommand(createCategoriesCommand());
  program.addCommand(createProductsCommand());

  return program;
}
