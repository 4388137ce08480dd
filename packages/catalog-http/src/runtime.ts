/**
 * Process-wide runtime
 *
 * Configuration, logger, document client and catalog are built on the first
 * request and reused by every later invocation of the same container.
 */

import {
  type Catalog,
  type CatalogConfig,
  CatalogTable,
  createCatalog,
  createDocClient,
  createDynamoDBClient,
  createLogger,
  type Logger,
  loadConfig,
} from '@catalog/catalog-core';

export interface CatalogRuntime {
  config: CatalogConfig;
  logger: Logger;
  catalog: Catalog;
}

let runtime: CatalogRuntime | null = null;

/**
 * Build the runtime of one function from the environment
 */
export function createRuntime(serviceName: string, env: NodeJS.ProcessEnv = process.env): CatalogRuntime {
  const config = loadConfig(env);
  const logger = createLogger(serviceName, config.logLevel);
  const docClient = createDocClient(createDynamoDBClient(config));
  const table = new CatalogTable(docClient, config.tableName);

  logger.debug('Catalog runtime created', {
    tableName: config.tableName,
    region: config.region,
    softDelete: config.softDelete,
  });

  return {
    config,
    logger,
    catalog: createCatalog(table, logger, { softDelete: config.softDelete }),
  };
}

export function getRuntime(serviceName: string): CatalogRuntime {
  if (!runtime) {
    runtime = createRuntime(serviceName);
  }
  return runtime;
}

/**
 * Replace the runtime, e.g. with one over an in-memory store
 */
export function setRuntime(replacement: CatalogRuntime): void {
  runtime = replacement;
}

export function resetRuntime(): void {
  runtime = null;
}
