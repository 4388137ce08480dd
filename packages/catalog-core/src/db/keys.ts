/**
 * DynamoDB Key Builders
 *
 * Pure mapping from entity type + id to primary keys and index descriptors.
 */

import { type EntityType, GSI, LIST_PARTITION, PREFIX } from './constants';

/**
 * Primary key of an item
 */
export interface ItemKey {
  PK: string;
  SK: string;
}

/**
 * Describes one secondary-index access pattern
 */
export interface IndexDescriptor {
  indexName: string;
  pkField: string;
  skField: string;
  pkValue: string;
  /** Restricts the sort key with begins_with */
  skPrefix?: string;
}

/**
 * Build the partition key `{TYPE}#{id}`
 */
export function entityPK(type: EntityType, id: string): string {
  return `${type}#${id}`;
}

/**
 * Build the sort key. Equal to the partition key for every entity.
 */
export function entitySK(type: EntityType, id: string): string {
  return `${type}#${id}`;
}

/**
 * Primary key pair for an entity
 */
export function entityKeys(type: EntityType, id: string): ItemKey {
  return {
    PK: entityPK(type, id),
    SK: entitySK(type, id),
  };
}

export const brandKeys = (brandId: string): ItemKey => entityKeys(PREFIX.BRAND, brandId);
export const categoryKeys = (categoryId: string): ItemKey => entityKeys(PREFIX.CATEGORY, categoryId);
export const productKeys = (productId: string): ItemKey => entityKeys(PREFIX.PRODUCT, productId);
export const productListKeys = (productId: string): ItemKey =>
  entityKeys(PREFIX.PRODUCT_LIST, productId);

/**
 * GSI-3 partition holding the products of a category
 */
export function categoryProductsPartition(categoryId: string): string {
  return `${PREFIX.CATEGORY}#${categoryId}`;
}

/**
 * GSI-3 sort value for the name-ordered lists
 */
export function nameSortKey(name: string): string {
  return name.toUpperCase();
}

/**
 * GSI-1: every entity whose SK begins with `{TYPE}#`
 */
export function typePrefixIndex(type: EntityType): IndexDescriptor {
  return {
    indexName: GSI.INVERTED.name,
    pkField: GSI.INVERTED.pk,
    skField: GSI.INVERTED.sk,
    pkValue: `${type}#`,
  };
}

/**
 * GSI-2: products of a brand, ordered by product id
 */
export function brandProductsIndex(brandId: string): IndexDescriptor {
  return {
    indexName: GSI.BRAND_PRODUCTS.name,
    pkField: GSI.BRAND_PRODUCTS.pk,
    skField: GSI.BRAND_PRODUCTS.sk,
    pkValue: brandId,
  };
}

/**
 * GSI-3: flexible partition, optionally narrowed by a sort key prefix
 */
export function gsi3Index(partition: string, skPrefix?: string): IndexDescriptor {
  return {
    indexName: GSI.FLEXIBLE.name,
    pkField: GSI.FLEXIBLE.pk,
    skField: GSI.FLEXIBLE.sk,
    pkValue: partition,
    ...(skPrefix !== undefined ? { skPrefix } : {}),
  };
}

export const brandListIndex = (): IndexDescriptor => gsi3Index(LIST_PARTITION.BRAND);
export const categoryListIndex = (): IndexDescriptor => gsi3Index(LIST_PARTITION.CATEGORY);
export const productListIndex = (): IndexDescriptor => gsi3Index(LIST_PARTITION.PRODUCT);
export const categoryProductsIndex = (categoryId: string): IndexDescriptor =>
  gsi3Index(categoryProductsPartition(categoryId));

/**
 * Extract the entity id from a `{TYPE}#{id}` key
 */
export function extractId(type: EntityType, key: string): string | null {
  const prefix = `${type}#`;
  if (!key.startsWith(prefix)) {
    return null;
  }
  return key.slice(prefix.length);
}
