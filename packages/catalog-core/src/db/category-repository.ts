/**
 * Category Repository
 *
 * Categories are listed by upper-cased name through the `CATEGORY_LIST` partition of
 * GSI-3. Name uniqueness is a read-then-write check against that partition and
 * is not enforced by the table.
 */

import { DuplicateError, NotFoundError } from '../errors/catalog-error';
import type { Category, CreateCategoryInput, UpdateCategoryFields } from '../types/category';
import type { ListOptions, Page } from '../types/common';
import type { Logger } from '../utils/logger';
import { validateCategoryUpdate, validateCreateCategory } from '../validators/category-validators';
import { NAME_CHECK_PAGE_SIZE, PREFIX } from './constants';
import { readString } from './item-readers';
import {
  buildCategoryItem,
  categoryUpdateStatement,
  itemToCategory,
  softDeleteStatement,
} from './items';
import { categoryKeys, categoryListIndex, nameSortKey, typePrefixIndex } from './keys';
import {
  mapPage,
  pageLimit,
  type RepositoryOptions,
  type ResolvedRepositoryOptions,
  resolveRepositoryOptions,
} from './repository-options';
import type { CatalogStore } from './store';

export class CategoryRepository {
  private readonly options: ResolvedRepositoryOptions;

  constructor(
    private readonly store: CatalogStore,
    private readonly logger: Logger,
    options?: RepositoryOptions
  ) {
    this.options = resolveRepositoryOptions(options);
  }

  /**
   * Create a category
   * @throws ValidationError, DuplicateError
   */
  async create(input: CreateCategoryInput): Promise<Category> {
    const validated = validateCreateCategory(input);

    if (await this.nameExists(validated.name)) {
      throw new DuplicateError(`Category name '${validated.name}' already exists`);
    }

    const categoryId = this.options.generateId();
    const now = this.now();
    await this.store.put(buildCategoryItem(categoryId, validated, now), 'item_not_exists');

    this.logger.info('Category created', { categoryId });
    return {
      category_id: categoryId,
      ...validated,
      created_at: now,
      updated_at: now,
    };
  }

  async get(categoryId: string): Promise<Category | null> {
    if (!categoryId) {
      return null;
    }
    const item = await this.store.get(categoryKeys(categoryId));
    return item ? itemToCategory(item) : null;
  }

  /**
   * Apply a partial update
   * @throws ValidationError, NotFoundError, DuplicateError
   */
  async update(categoryId: string, fields: UpdateCategoryFields): Promise<Category> {
    const validated = validateCategoryUpdate(fields);

    if (!(await this.exists(categoryId))) {
      throw new NotFoundError(`Category with ID '${categoryId}' not found`);
    }
    if (validated.name !== undefined && (await this.nameExists(validated.name, categoryId))) {
      throw new DuplicateError(`Category name '${validated.name}' already exists`);
    }

    const item = await this.store.update(
      categoryKeys(categoryId),
      categoryUpdateStatement(validated, this.now()),
      'item_exists'
    );

    this.logger.info('Category updated', { categoryId, fields: Object.keys(validated) });
    return itemToCategory(item);
  }

  /**
   * Delete a category. Returns false when it does not exist.
   */
  async delete(categoryId: string): Promise<boolean> {
    if (!(await this.exists(categoryId))) {
      return false;
    }

    const keys = categoryKeys(categoryId);
    if (this.options.softDelete) {
      await this.store.update(keys, softDeleteStatement(this.now()), 'item_exists');
    } else if ((await this.store.delete(keys)) === null) {
      return false;
    }

    this.logger.info('Category deleted', { categoryId, soft: this.options.softDelete });
    return true;
  }

  async exists(categoryId: string): Promise<boolean> {
    if (!categoryId) {
      return false;
    }
    return this.store.exists(categoryKeys(categoryId));
  }

  /**
   * List categories ordered by name
   */
  async list(options: ListOptions = {}): Promise<Page<Category>> {
    const page = await this.store.queryByIndex({
      index: categoryListIndex(),
      limit: pageLimit(options.limit),
      continuationToken: options.continuationToken,
    });
    return mapPage(page, itemToCategory);
  }

  /**
   * Every category item found through the GSI-1 type prefix, in index order
   */
  async listByTypePrefix(options: ListOptions = {}): Promise<Page<Category>> {
    const page = await this.store.scanByPrefix({
      index: typePrefixIndex(PREFIX.CATEGORY),
      limit: pageLimit(options.limit),
      continuationToken: options.continuationToken,
    });
    return mapPage(page, itemToCategory);
  }

  /**
   * Case-insensitive name lookup over the first page of the category list.
   * A failed lookup is logged and reported as no duplicate.
   */
  private async nameExists(name: string, excludeCategoryId?: string): Promise<boolean> {
    const target = nameSortKey(name.trim());
    try {
      const page = await this.store.queryByIndex({
        index: categoryListIndex(),
        limit: NAME_CHECK_PAGE_SIZE,
      });
      return page.items.some(
        (item) =>
          nameSortKey(readString(item, 'name').trim()) === target &&
          readString(item, 'category_id') !== excludeCategoryId
      );
    } catch (error) {
      this.logger.warn('Category name uniqueness check failed, assuming no duplicate', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private now(): string {
    return this.options.clock().toISOString();
  }
}
