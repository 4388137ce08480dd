import { beforeEach, describe, expect, it } from 'vitest';
import { brandKeys, brandListIndex } from '../db/keys';
import { InMemoryCatalogStore } from './in-memory-store';

function brandItem(id: string, name: string) {
  return { ...brandKeys(id), GSI3PK: 'BRAND_LIST', GSI3SK: name.toUpperCase(), name };
}

describe('InMemoryCatalogStore', () => {
  let store: InMemoryCatalogStore;

  beforeEach(async () => {
    store = new InMemoryCatalogStore();
    await store.put(brandItem('b-1', 'Alpha'));
    await store.put(brandItem('b-2', 'Bravo'));
  });

  describe('queryByIndex', () => {
    it('should return a key for a page that fills the limit on the last item', async () => {
      const page = await store.queryByIndex({ index: brandListIndex(), limit: 2 });

      expect(page.items.map((item) => item.name)).toEqual(['Alpha', 'Bravo']);
      expect(page.nextContinuationToken).not.toBeNull();

      const next = await store.queryByIndex({
        index: brandListIndex(),
        limit: 2,
        continuationToken: page.nextContinuationToken,
      });
      expect(next).toEqual({ items: [], nextContinuationToken: null });
    });

    it('should end without a key when the page is short', async () => {
      const page = await store.queryByIndex({ index: brandListIndex(), limit: 3 });

      expect(page.items).toHaveLength(2);
      expect(page.nextContinuationToken).toBeNull();
    });
  });

  describe('delete', () => {
    it('should return the removed item and null for a missing key', async () => {
      expect(await store.delete(brandKeys('b-1'))).toEqual(brandItem('b-1', 'Alpha'));
      expect(store.rawItem(brandKeys('b-1'))).toBeUndefined();
      expect(await store.delete(brandKeys('b-9'))).toBeNull();
    });
  });
});
