/**
 * Database exports for @catalog/catalog-core
 */

// Constants
export {
  PK_FIELD,
  SK_FIELD,
  PREFIX,
  GSI,
  LIST_PARTITION,
  ENTITY_TYPE,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  NAME_CHECK_PAGE_SIZE,
  type EntityType,
} from './constants';

// Key builders
export {
  entityPK,
  entitySK,
  entityKeys,
  brandKeys,
  categoryKeys,
  productKeys,
  productListKeys,
  categoryProductsPartition,
  nameSortKey,
  typePrefixIndex,
  brandProductsIndex,
  gsi3Index,
  brandListIndex,
  categoryListIndex,
  productListIndex,
  categoryProductsIndex,
  extractId,
  type IndexDescriptor,
  type ItemKey,
} from './keys';

// Item builders
export {
  buildBrandItem,
  buildCategoryItem,
  buildProductItem,
  buildProductListItem,
  brandUpdateStatement,
  categoryUpdateStatement,
  productUpdateStatements,
  softDeleteStatement,
  itemToBrand,
  itemToCategory,
  itemToProduct,
  listItemToProduct,
  BRAND_UPDATE_FIELDS,
  CATEGORY_UPDATE_FIELDS,
  PRODUCT_UPDATE_FIELDS,
} from './items';

// Client
export {
  createClientConfig,
  createDynamoDBClient,
  createDocClient,
  CONNECTION_TIMEOUT_MS,
  REQUEST_TIMEOUT_MS,
} from './client';

// Store
export { CatalogTable } from './catalog-table';
export { decodeContinuationToken, encodeContinuationToken } from './continuation-token';
export type {
  BatchWriteRequest,
  CatalogItem,
  CatalogStore,
  IndexQuery,
  PrefixScan,
  UpdateStatement,
  WriteCondition,
} from './store';

// Repositories
export { BrandRepository } from './brand-repository';
export { CategoryRepository } from './category-repository';
export { ProductRepository } from './product-repository';
export type { RepositoryOptions } from './repository-options';
