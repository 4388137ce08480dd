/**
 * Table commands
 */

import {
  CreateTableCommand,
  DescribeTableCommand,
  ResourceInUseException,
  ResourceNotFoundException,
} from '@aws-sdk/client-dynamodb';
import { Command } from 'commander';
import { type GlobalOptions, openTable } from '../context';
import { checkTable, createTableInput } from '../table/schema';
import { error, getOutputFormat, info, printJson, success, verbose, warn } from '../utils/output';

function fail(message: string): void {
  error(message);
  process.exitCode = 1;
}

export function createTableCommand(): Command {
  const table = new Command('table').description('Catalog table management');

  // table create
  table
    .command('create')
    .description('Create the catalog table and its secondary indexes')
    .action(async (_options: object, command: Command) => {
      const { config, client } = openTable(command.optsWithGlobals<GlobalOptions>());
      verbose(`Creating ${config.tableName} in ${config.endpoint ?? config.region}`);

      try {
        const result = await client.send(new CreateTableCommand(createTableInput(config.tableName)));
        success(`Table ${config.tableName} created (${result.TableDescription?.TableStatus ?? 'UNKNOWN'})`);
      } catch (err) {
        if (err instanceof ResourceInUseException) {
          warn(`Table ${config.tableName} already exists`);
          return;
        }
        fail(err instanceof Error ? err.message : 'Failed to create table');
      } finally {
        client.destroy();
      }
    });

  // table check
  table
    .command('check')
    .description('Verify the table keys and secondary indexes')
    .action(async (_options: object, command: Command) => {
      const { config, client } = openTable(command.optsWithGlobals<GlobalOptions>());

      try {
        const { Table } = await client.send(new DescribeTableCommand({ TableName: config.tableName }));
        if (!Table) {
          fail(`Table ${config.tableName} could not be described`);
          return;
        }

        const problems = checkTable(Table);
        if (getOutputFormat() === 'json') {
          printJson({ table: config.tableName, status: Table.TableStatus, problems });
        } else {
          info(`Table ${config.tableName}: ${Table.TableStatus ?? 'UNKNOWN'}, ${Table.ItemCount ?? 0} items`);
        }

        if (problems.length > 0) {
          for (const problem of problems) {
            fail(problem);
          }
          return;
        }
        success(`Table ${config.tableName} matches the catalog definition`);
      } catch (err) {
        if (err instanceof ResourceNotFoundException) {
          fail(`Table ${config.tableName} does not exist, run "table create"`);
          return;
        }
        fail(err instanceof Error ? err.message : 'Failed to describe table');
      } finally {
        client.destroy();
      }
    });

  return table;
}
