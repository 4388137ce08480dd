/**
 * Command context
 *
 * Global options override the environment; everything else comes from the
 * same configuration the functions load.
 */

import type { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  type Catalog,
  type CatalogConfig,
  CatalogTable,
  createCatalog,
  createDocClient,
  createDynamoDBClient,
  createLogger,
  loadConfig,
} from '@catalog/catalog-core';

export interface GlobalOptions {
  output?: string;
  quiet?: boolean;
  verbose?: boolean;
  table?: string;
  region?: string;
  endpoint?: string;
}

export function resolveConfig(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): CatalogConfig {
  return loadConfig({
    ...env,
    ...(options.table ? { DYNAMODB_TABLE: options.table } : {}),
    ...(options.region ? { AWS_REGION: options.region } : {}),
    ...(options.endpoint ? { DYNAMODB_ENDPOINT: options.endpoint } : {}),
    LOG_LEVEL: options.verbose ? 'DEBUG' : 'SILENT',
  });
}

export interface AdminContext {
  config: CatalogConfig;
  client: DynamoDBClient;
}

export function openTable(options: GlobalOptions): AdminContext {
  const config = resolveConfig(options);
  return { config, client: createDynamoDBClient(config) };
}

export function openCatalog(options: GlobalOptions): { config: CatalogConfig; catalog: Catalog } {
  const { config, client } = openTable(options);
  const logger = createLogger('catalog-admin', config.logLevel);
  const table = new CatalogTable(createDocClient(client), config.tableName);
  return { config, catalog: createCatalog(table, logger, { softDelete: config.softDelete }) };
}
