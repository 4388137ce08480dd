/**
 * DynamoDB Table Constants
 *
 * Brands, categories and products share one table. Every item is keyed by
 * `PK`/`SK` holding the same `{TYPE}#{id}` value; secondary indexes carry the
 * listing access patterns.
 */

// Primary key attribute names
export const PK_FIELD = 'PK';
export const SK_FIELD = 'SK';

// Key prefixes for Single Table Design
export const PREFIX = {
  BRAND: 'BRAND',
  CATEGORY: 'CATEGORY',
  PRODUCT: 'PRODUCT',
  PRODUCT_LIST: 'PRODUCT_LIST',
} as const;

export type EntityType = (typeof PREFIX)[keyof typeof PREFIX];

// GSI definitions
export const GSI = {
  /** GSI-1: inverted index, list entities whose SK begins with a type prefix */
  INVERTED: { name: 'GSI-1', pk: SK_FIELD, sk: PK_FIELD },
  /** GSI-2: products of a brand */
  BRAND_PRODUCTS: { name: 'GSI-2', pk: 'brand_id', sk: 'product_id' },
  /** GSI-3: free-form partition/sort used by the name-ordered lists */
  FLEXIBLE: { name: 'GSI-3', pk: 'GSI3PK', sk: 'GSI3SK' },
} as const;

// GSI-3 partitions
export const LIST_PARTITION = {
  BRAND: 'BRAND_LIST',
  CATEGORY: 'CATEGORY_LIST',
  PRODUCT: 'PRODUCT_LIST',
} as const;

// Entity discriminator stored on every item
export const ENTITY_TYPE = {
  BRAND: 'brand',
  CATEGORY: 'category',
  PRODUCT: 'product',
  PRODUCT_LIST: 'product_list',
} as const;

// Pagination defaults
export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

// Uniqueness checks read a single page of the list partition
export const NAME_CHECK_PAGE_SIZE = 100;

// BatchGetItem / BatchWriteItem request limits
export const BATCH_GET_LIMIT = 100;
export const BATCH_WRITE_LIMIT = 25;
export const BATCH_MAX_ATTEMPTS = 5;
