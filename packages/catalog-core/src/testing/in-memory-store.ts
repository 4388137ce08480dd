/**
 * In-memory catalog store
 *
 * Process-local `CatalogStore` for tests. Follows the table's semantics where
 * tests can observe them: conditional writes, sparse secondary indexes,
 * sort-key ordering, `limit` applied before the soft-delete filter, and
 * continuation tokens in the same format as `CatalogTable`.
 */

import { decodeContinuationToken, encodeContinuationToken } from '../db/continuation-token';
import type { IndexDescriptor, ItemKey } from '../db/keys';
import type {
  BatchWriteRequest,
  CatalogItem,
  CatalogStore,
  IndexQuery,
  PrefixScan,
  UpdateStatement,
  WriteCondition,
} from '../db/store';
import { DuplicateError, NotFoundError } from '../errors/catalog-error';
import type { Page } from '../types/common';

type StoreOperation = keyof CatalogStore;

function storageKey(key: ItemKey): string {
  return `${key.PK}\u0000${key.SK}`;
}

function toRecord(item: object): CatalogItem {
  return Object.fromEntries(Object.entries(item).filter(([, value]) => value !== undefined));
}

function readKey(item: CatalogItem): ItemKey {
  const { PK, SK } = item;
  if (typeof PK !== 'string' || typeof SK !== 'string') {
    throw new Error('Item is missing its PK/SK attributes');
  }
  return { PK, SK };
}

function isLive(item: CatalogItem): boolean {
  return item.deleted_at === undefined;
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

interface IndexEntry {
  item: CatalogItem;
  pk: string;
  sk: string;
  key: ItemKey;
}

function compareEntries(a: IndexEntry, b: IndexEntry): number {
  return (
    compareStrings(a.pk, b.pk) ||
    compareStrings(a.sk, b.sk) ||
    compareStrings(a.key.PK, b.key.PK) ||
    compareStrings(a.key.SK, b.key.SK)
  );
}

export class InMemoryCatalogStore implements CatalogStore {
  private readonly items = new Map<string, CatalogItem>();
  private readonly failures = new Map<StoreOperation, Error[]>();

  /**
   * Make the next call(s) of `operation` reject with `error`, once per call
   */
  failOn(operation: StoreOperation, error: Error): void {
    const queued = this.failures.get(operation) ?? [];
    queued.push(error);
    this.failures.set(operation, queued);
  }

  /**
   * Stored attributes of an item, soft-deleted or not
   */
  rawItem(key: ItemKey): CatalogItem | undefined {
    const item = this.items.get(storageKey(key));
    return item ? structuredClone(item) : undefined;
  }

  get size(): number {
    return this.items.size;
  }

  async get(key: ItemKey): Promise<CatalogItem | null> {
    this.maybeFail('get');
    const item = this.items.get(storageKey(key));
    return item && isLive(item) ? structuredClone(item) : null;
  }

  async put(item: object, condition?: WriteCondition): Promise<void> {
    this.maybeFail('put');
    const record = toRecord(item);
    const key = storageKey(readKey(record));
    const existing = this.items.has(key);

    if (
      (condition === 'item_not_exists' && existing) ||
      (condition === 'item_exists' && !existing)
    ) {
      throw new DuplicateError('Item already exists or condition not met');
    }
    this.items.set(key, structuredClone(record));
  }

  async update(
    key: ItemKey,
    statement: UpdateStatement,
    condition?: WriteCondition
  ): Promise<CatalogItem> {
    this.maybeFail('update');
    const existing = this.items.get(storageKey(key));

    if (
      (condition === 'item_exists' && !existing) ||
      (condition === 'item_not_exists' && existing)
    ) {
      throw new NotFoundError('Item not found or condition not met');
    }

    const updated: CatalogItem = { ...(existing ?? { PK: key.PK, SK: key.SK }) };
    for (const [field, value] of Object.entries(statement.set)) {
      updated[field] = structuredClone(value);
    }
    for (const field of statement.remove) {
      delete updated[field];
    }

    this.items.set(storageKey(key), updated);
    return structuredClone(updated);
  }

  async delete(key: ItemKey, condition?: WriteCondition): Promise<CatalogItem | null> {
    this.maybeFail('delete');
    const existing = this.items.get(storageKey(key));

    if (
      (condition === 'item_exists' && !existing) ||
      (condition === 'item_not_exists' && existing)
    ) {
      throw new NotFoundError('Item not found');
    }

    this.items.delete(storageKey(key));
    return existing ? structuredClone(existing) : null;
  }

  async exists(key: ItemKey): Promise<boolean> {
    this.maybeFail('exists');
    const item = this.items.get(storageKey(key));
    return item !== undefined && isLive(item);
  }

  async queryByIndex(query: IndexQuery): Promise<Page<CatalogItem>> {
    this.maybeFail('queryByIndex');
    const { index } = query;
    const entries = this.indexEntries(index).filter(
      (entry) =>
        entry.pk === index.pkValue &&
        (index.skPrefix === undefined || entry.sk.startsWith(index.skPrefix))
    );
    return this.page(entries, index, query.limit, query.continuationToken);
  }

  async scanByPrefix(scan: PrefixScan): Promise<Page<CatalogItem>> {
    this.maybeFail('scanByPrefix');
    const { index } = scan;
    const entries = this.indexEntries(index).filter((entry) => entry.pk.startsWith(index.pkValue));
    return this.page(entries, index, scan.limit, scan.continuationToken);
  }

  async batchGet(keys: ItemKey[]): Promise<CatalogItem[]> {
    this.maybeFail('batchGet');
    return keys.flatMap((key) => {
      const item = this.items.get(storageKey(key));
      return item && isLive(item) ? [structuredClone(item)] : [];
    });
  }

  async batchWrite(request: BatchWriteRequest): Promise<void> {
    this.maybeFail('batchWrite');
    for (const item of request.puts ?? []) {
      const record = toRecord(item);
      this.items.set(storageKey(readKey(record)), structuredClone(record));
    }
    for (const key of request.deletes ?? []) {
      this.items.delete(storageKey(key));
    }
  }

  /**
   * Items projected into an index: those carrying both index key attributes as strings
   */
  private indexEntries(index: IndexDescriptor): IndexEntry[] {
    const entries: IndexEntry[] = [];
    for (const item of this.items.values()) {
      const pk = item[index.pkField];
      const sk = item[index.skField];
      if (typeof pk === 'string' && typeof sk === 'string') {
        entries.push({ item, pk, sk, key: readKey(item) });
      }
    }
    return entries.sort(compareEntries);
  }

  private page(
    entries: IndexEntry[],
    index: IndexDescriptor,
    limit: number,
    continuationToken: string | null | undefined
  ): Page<CatalogItem> {
    const startKey = decodeContinuationToken(continuationToken);
    let start = 0;
    if (startKey) {
      const after: IndexEntry = {
        item: {},
        pk: startKey[index.pkField] ?? '',
        sk: startKey[index.skField] ?? '',
        key: { PK: startKey.PK ?? '', SK: startKey.SK ?? '' },
      };
      start = entries.findIndex((entry) => compareEntries(entry, after) > 0);
      if (start === -1) {
        start = entries.length;
      }
    }

    // A full page always carries a key, even when it ends on the last entry
    const evaluated = entries.slice(start, start + limit);
    const last = evaluated.length === limit ? evaluated.at(-1) : undefined;

    return {
      items: evaluated.filter((entry) => isLive(entry.item)).map((entry) => structuredClone(entry.item)),
      nextContinuationToken:
        last
          ? encodeContinuationToken({
              PK: last.key.PK,
              SK: last.key.SK,
              [index.pkField]: last.pk,
              [index.skField]: last.sk,
            })
          : null,
    };
  }

  private maybeFail(operation: StoreOperation): void {
    const error = this.failures.get(operation)?.shift();
    if (error) {
      throw error;
    }
  }
}
