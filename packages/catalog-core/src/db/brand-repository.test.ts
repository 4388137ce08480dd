import { beforeEach, describe, expect, it } from 'vitest';
import { DatabaseError, DuplicateError, NotFoundError, ValidationError } from '../errors/catalog-error';
import { InMemoryCatalogStore } from '../testing/in-memory-store';
import { sequentialUuid } from '../testing/test-catalog';
import type { Brand } from '../types/brand';
import type { Page } from '../types/common';
import { createLogger } from '../utils/logger';
import { BrandRepository } from './brand-repository';
import { brandKeys } from './keys';

const CREATED = new Date('2024-01-01T00:00:00.000Z');
const UPDATED = new Date('2024-01-02T00:00:00.000Z');

describe('BrandRepository', () => {
  let store: InMemoryCatalogStore;
  let brands: BrandRepository;
  let now: Date;

  beforeEach(() => {
    let counter = 0;
    now = CREATED;
    store = new InMemoryCatalogStore();
    brands = new BrandRepository(store, createLogger('brand-test', 'SILENT'), {
      clock: () => now,
      generateId: () => sequentialUuid(++counter),
    });
  });

  describe('create', () => {
    it('should store the brand and read it back unchanged', async () => {
      const brand = await brands.create({
        name: 'Acme',
        description: 'A fine acme brand indeed',
        website: 'https://acme.test',
      });

      expect(brand).toEqual({
        brand_id: sequentialUuid(1),
        name: 'Acme',
        description: 'A fine acme brand indeed',
        website: 'https://acme.test',
        created_at: CREATED.toISOString(),
        updated_at: CREATED.toISOString(),
      });
      expect(await brands.get(brand.brand_id)).toEqual(brand);
      expect(store.rawItem(brandKeys(brand.brand_id))).toMatchObject({
        GSI3PK: 'BRAND_LIST',
        GSI3SK: 'ACME',
        entity_type: 'brand',
      });
    });

    it('should reject names that differ only by case or surrounding whitespace', async () => {
      await brands.create({ name: 'Acme', description: 'A fine acme brand indeed' });

      await expect(
        brands.create({ name: '  ACME ', description: 'Another acme brand here' })
      ).rejects.toThrow(new DuplicateError("Brand name 'ACME' already exists"));
      expect(store.size).toBe(1);
    });

    it('should validate before touching the store', async () => {
      await expect(brands.create({ name: 'A', description: 'A fine acme brand indeed' })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(store.size).toBe(0);
    });

    it('should proceed when the uniqueness lookup fails', async () => {
      store.failOn('queryByIndex', new DatabaseError('throttled', 'queryByIndex'));

      const brand = await brands.create({ name: 'Acme', description: 'A fine acme brand indeed' });

      expect(await brands.exists(brand.brand_id)).toBe(true);
    });
  });

  describe('update', () => {
    it('should rename, recompute the sort key and refresh updated_at', async () => {
      const brand = await brands.create({ name: 'Acme', description: 'A fine acme brand indeed' });
      now = UPDATED;

      const updated = await brands.update(brand.brand_id, { name: 'Zeta Tools' });

      expect(updated).toEqual({
        ...brand,
        name: 'Zeta Tools',
        updated_at: UPDATED.toISOString(),
      });
      expect(store.rawItem(brandKeys(brand.brand_id))?.GSI3SK).toBe('ZETA TOOLS');
    });

    it('should allow keeping its own name in a different case', async () => {
      const brand = await brands.create({ name: 'Acme', description: 'A fine acme brand indeed' });

      const updated = await brands.update(brand.brand_id, { name: 'ACME' });

      expect(updated.name).toBe('ACME');
    });

    it('should reject a rename onto another brand', async () => {
      await brands.create({ name: 'Acme', description: 'A fine acme brand indeed' });
      const other = await brands.create({ name: 'Zeta', description: 'The zeta brand of tools' });

      await expect(brands.update(other.brand_id, { name: 'acme' })).rejects.toBeInstanceOf(
        DuplicateError
      );
    });

    it('should clear the website', async () => {
      const brand = await brands.create({
        name: 'Acme',
        description: 'A fine acme brand indeed',
        website: 'https://acme.test',
      });

      const updated = await brands.update(brand.brand_id, { website: null });

      expect('website' in updated).toBe(false);
    });

    it('should fail for a missing brand', async () => {
      await expect(brands.update(sequentialUuid(99), { name: 'Zeta' })).rejects.toThrow(
        new NotFoundError(`Brand with ID '${sequentialUuid(99)}' not found`)
      );
    });
  });

  describe('delete', () => {
    it('should report false for a missing brand, and never throw on repeat', async () => {
      const brand = await brands.create({ name: 'Acme', description: 'A fine acme brand indeed' });

      expect(await brands.delete(brand.brand_id)).toBe(true);
      expect(await brands.delete(brand.brand_id)).toBe(false);
      expect(await brands.get(brand.brand_id)).toBeNull();
      expect(store.size).toBe(0);
    });

    it('should keep a marked item when soft delete is enabled', async () => {
      const softBrands = new BrandRepository(store, createLogger('brand-test', 'SILENT'), {
        softDelete: true,
        clock: () => UPDATED,
        generateId: () => sequentialUuid(50),
      });
      const brand = await softBrands.create({ name: 'Acme', description: 'A fine acme brand indeed' });

      expect(await softBrands.delete(brand.brand_id)).toBe(true);

      expect(await softBrands.get(brand.brand_id)).toBeNull();
      expect(await softBrands.delete(brand.brand_id)).toBe(false);
      const raw = store.rawItem(brandKeys(brand.brand_id));
      expect(raw?.deleted_at).toBe(UPDATED.toISOString());
      expect(raw && 'GSI3PK' in raw).toBe(false);
      expect((await softBrands.list()).items).toEqual([]);
    });
  });

  describe('list', () => {
    it('should page through brands ordered by upper-cased name', async () => {
      for (const name of ['delta', 'Alpha', 'charlie', 'Bravo']) {
        await brands.create({ name, description: `The ${name} brand of tools` });
      }

      const names: string[] = [];
      let token: string | null = null;
      let pages = 0;
      do {
        const page: Page<Brand> = await brands.list({ limit: 1, continuationToken: token });
        names.push(...page.items.map((brand) => brand.name));
        token = page.nextContinuationToken;
        pages++;
      } while (token !== null);

      // a full last page still returns a key, so the walk ends on an empty page
      expect(pages).toBe(5);
      expect(names).toEqual(['Alpha', 'Bravo', 'charlie', 'delta']);
      expect((await brands.list()).items.map((brand) => brand.name)).toEqual(names);
    });

    it('should list every brand through the type prefix index', async () => {
      await brands.create({ name: 'Acme', description: 'A fine acme brand indeed' });
      await brands.create({ name: 'Zeta', description: 'The zeta brand of tools' });

      const page = await brands.listByTypePrefix();

      expect(page.items.map((brand) => brand.brand_id)).toEqual([sequentialUuid(1), sequentialUuid(2)]);
      expect(page.nextContinuationToken).toBeNull();
    });
  });
});
