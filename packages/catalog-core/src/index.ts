/**
 * @catalog/catalog-core
 *
 * Single-table product catalog on DynamoDB
 * - Brand, Category and Product entity types
 * - Key scheme and secondary-index access patterns
 * - Storage client, repositories and services
 * - Configuration, logging and the error taxonomy
 */

export * from './types';
export * from './db';
export * from './errors';
export * from './config';
export * from './validators';
export * from './services';
export { type Catalog, type CatalogRepositories, createCatalog } from './catalog';
export { componentLogger, createLogger, type Logger } from './utils/logger';
