import { beforeEach, describe, expect, it } from 'vitest';
import { DuplicateError, NotFoundError } from '../errors/catalog-error';
import { InMemoryCatalogStore } from '../testing/in-memory-store';
import { sequentialUuid } from '../testing/test-catalog';
import { createLogger } from '../utils/logger';
import { CategoryRepository } from './category-repository';
import { categoryKeys } from './keys';

describe('CategoryRepository', () => {
  let store: InMemoryCatalogStore;
  let categories: CategoryRepository;

  beforeEach(() => {
    let counter = 0;
    store = new InMemoryCatalogStore();
    categories = new CategoryRepository(store, createLogger('category-test', 'SILENT'), {
      clock: () => new Date('2024-01-01T00:00:00.000Z'),
      generateId: () => sequentialUuid(++counter),
    });
  });

  it('should create a category in the CATEGORY_LIST partition', async () => {
    const category = await categories.create({
      name: 'Gadgets',
      description: 'Electronic gadgets and gizmos',
    });

    expect(category).toEqual({
      category_id: sequentialUuid(1),
      name: 'Gadgets',
      description: 'Electronic gadgets and gizmos',
      created_at: '2024-01-01T00:00:00.000Z',
      updated_at: '2024-01-01T00:00:00.000Z',
    });
    expect(store.rawItem(categoryKeys(category.category_id))).toMatchObject({
      PK: `CATEGORY#${sequentialUuid(1)}`,
      SK: `CATEGORY#${sequentialUuid(1)}`,
      GSI3PK: 'CATEGORY_LIST',
      GSI3SK: 'GADGETS',
      entity_type: 'category',
    });
  });

  it('should enforce case-insensitive name uniqueness', async () => {
    await categories.create({ name: 'Gadgets', description: 'Electronic gadgets and gizmos' });

    await expect(
      categories.create({ name: 'gadgets', description: 'Other gadgets and gizmos' })
    ).rejects.toBeInstanceOf(DuplicateError);
  });

  it('should update the description only', async () => {
    const category = await categories.create({
      name: 'Gadgets',
      description: 'Electronic gadgets and gizmos',
    });

    const updated = await categories.update(category.category_id, {
      description: 'Gadgets of every kind',
    });

    expect(updated.name).toBe('Gadgets');
    expect(updated.description).toBe('Gadgets of every kind');
    expect(store.rawItem(categoryKeys(category.category_id))?.GSI3SK).toBe('GADGETS');
  });

  it('should report missing categories', async () => {
    expect(await categories.get(sequentialUuid(7))).toBeNull();
    expect(await categories.exists(sequentialUuid(7))).toBe(false);
    expect(await categories.delete(sequentialUuid(7))).toBe(false);
    await expect(
      categories.update(sequentialUuid(7), { name: 'Tools' })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should list categories by name', async () => {
    await categories.create({ name: 'Tools', description: 'Hand and power tools' });
    await categories.create({ name: 'gadgets', description: 'Electronic gadgets and gizmos' });

    const page = await categories.list({ limit: 10 });

    expect(page.items.map((category) => category.name)).toEqual(['gadgets', 'Tools']);
    expect(page.nextContinuationToken).toBeNull();
  });
});
