/**
 * Storage contract for the catalog table.
 *
 * Repositories depend on this interface only; `CatalogTable` implements it on
 * DynamoDB and `InMemoryCatalogStore` (testing) in process.
 */

import type { Page } from '../types/common';
import type { IndexDescriptor, ItemKey } from './keys';

/**
 * Raw attribute map as persisted. Numbers are plain JS numbers on both sides
 * of the store boundary.
 */
export type CatalogItem = Record<string, unknown>;

/**
 * Condition a single-item write must satisfy
 * - `item_not_exists`: no item with the same key (duplicate on failure)
 * - `item_exists`: the item must already exist (not found on failure)
 */
export type WriteCondition = 'item_exists' | 'item_not_exists';

/**
 * SET and REMOVE clauses of an update, keyed by attribute name
 */
export interface UpdateStatement {
  set: Record<string, unknown>;
  remove: string[];
}

export interface IndexQuery {
  index: IndexDescriptor;
  limit: number;
  continuationToken?: string | null;
}

export interface PrefixScan {
  index: IndexDescriptor;
  limit: number;
  continuationToken?: string | null;
}

export interface BatchWriteRequest {
  puts?: object[];
  deletes?: ItemKey[];
}

export interface CatalogStore {
  get(key: ItemKey): Promise<CatalogItem | null>;
  /** @throws DuplicateError when `condition` fails */
  put(item: object, condition?: WriteCondition): Promise<void>;
  /** @throws NotFoundError when `condition` fails */
  update(key: ItemKey, statement: UpdateStatement, condition?: WriteCondition): Promise<CatalogItem>;
  /** @throws NotFoundError when `condition` fails */
  delete(key: ItemKey, condition?: WriteCondition): Promise<CatalogItem | null>;
  /** Minimal-projection read */
  exists(key: ItemKey): Promise<boolean>;
  /** Key-condition query over a secondary index, soft-deleted items filtered out */
  queryByIndex(query: IndexQuery): Promise<Page<CatalogItem>>;
  /** Index scan keeping items whose index partition value begins with `index.pkValue` */
  scanByPrefix(scan: PrefixScan): Promise<Page<CatalogItem>>;
  batchGet(keys: ItemKey[]): Promise<CatalogItem[]>;
  batchWrite(request: BatchWriteRequest): Promise<void>;
}
