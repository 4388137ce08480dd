/**
 * Brand Repository
 *
 * Brands are listed by upper-cased name through the `BRAND_LIST` partition of
 * GSI-3. Name uniqueness is a read-then-write check against that partition and
 * is not enforced by the table.
 */

import { DuplicateError, NotFoundError } from '../errors/catalog-error';
import type { Brand, CreateBrandInput, UpdateBrandFields } from '../types/brand';
import type { ListOptions, Page } from '../types/common';
import type { Logger } from '../utils/logger';
import { validateBrandUpdate, validateCreateBrand } from '../validators/brand-validators';
import { NAME_CHECK_PAGE_SIZE, PREFIX } from './constants';
import { readString } from './item-readers';
import { brandUpdateStatement, buildBrandItem, itemToBrand, softDeleteStatement } from './items';
import { brandKeys, brandListIndex, nameSortKey, typePrefixIndex } from './keys';
import {
  mapPage,
  pageLimit,
  type RepositoryOptions,
  type ResolvedRepositoryOptions,
  resolveRepositoryOptions,
} from './repository-options';
import type { CatalogStore } from './store';

export class BrandRepository {
  private readonly options: ResolvedRepositoryOptions;

  constructor(
    private readonly store: CatalogStore,
    private readonly logger: Logger,
    options?: RepositoryOptions
  ) {
    this.options = resolveRepositoryOptions(options);
  }

  /**
   * Create a brand
   * @throws ValidationError, DuplicateError
   */
  async create(input: CreateBrandInput): Promise<Brand> {
    const validated = validateCreateBrand(input);

    if (await this.nameExists(validated.name)) {
      throw new DuplicateError(`Brand name '${validated.name}' already exists`);
    }

    const brandId = this.options.generateId();
    const now = this.now();
    await this.store.put(buildBrandItem(brandId, validated, now), 'item_not_exists');

    this.logger.info('Brand created', { brandId });
    return {
      brand_id: brandId,
      ...validated,
      created_at: now,
      updated_at: now,
    };
  }

  async get(brandId: string): Promise<Brand | null> {
    if (!brandId) {
      return null;
    }
    const item = await this.store.get(brandKeys(brandId));
    return item ? itemToBrand(item) : null;
  }

  /**
   * Apply a partial update
   * @throws ValidationError, NotFoundError, DuplicateError
   */
  async update(brandId: string, fields: UpdateBrandFields): Promise<Brand> {
    const validated = validateBrandUpdate(fields);

    if (!(await this.exists(brandId))) {
      throw new NotFoundError(`Brand with ID '${brandId}' not found`);
    }
    if (validated.name !== undefined && (await this.nameExists(validated.name, brandId))) {
      throw new DuplicateError(`Brand name '${validated.name}' already exists`);
    }

    const item = await this.store.update(
      brandKeys(brandId),
      brandUpdateStatement(validated, this.now()),
      'item_exists'
    );

    this.logger.info('Brand updated', { brandId, fields: Object.keys(validated) });
    return itemToBrand(item);
  }

  /**
   * Delete a brand. Returns false when it does not exist.
   */
  async delete(brandId: string): Promise<boolean> {
    if (!(await this.exists(brandId))) {
      return false;
    }

    const keys = brandKeys(brandId);
    if (this.options.softDelete) {
      await this.store.update(keys, softDeleteStatement(this.now()), 'item_exists');
    } else if ((await this.store.delete(keys)) === null) {
      return false;
    }

    this.logger.info('Brand deleted', { brandId, soft: this.options.softDelete });
    return true;
  }

  async exists(brandId: string): Promise<boolean> {
    if (!brandId) {
      return false;
    }
    return this.store.exists(brandKeys(brandId));
  }

  /**
   * List brands ordered by name
   */
  async list(options: ListOptions = {}): Promise<Page<Brand>> {
    const page = await this.store.queryByIndex({
      index: brandListIndex(),
      limit: pageLimit(options.limit),
      continuationToken: options.continuationToken,
    });
    return mapPage(page, itemToBrand);
  }

  /**
   * Every brand item found through the GSI-1 type prefix, in index order
   */
  async listByTypePrefix(options: ListOptions = {}): Promise<Page<Brand>> {
    const page = await this.store.scanByPrefix({
      index: typePrefixIndex(PREFIX.BRAND),
      limit: pageLimit(options.limit),
      continuationToken: options.continuationToken,
    });
    return mapPage(page, itemToBrand);
  }

  /**
   * Case-insensitive name lookup over the first page of the brand list.
   * A failed lookup is logged and reported as no duplicate.
   */
  private async nameExists(name: string, excludeBrandId?: string): Promise<boolean> {
    const target = nameSortKey(name.trim());
    try {
      const page = await this.store.queryByIndex({
        index: brandListIndex(),
        limit: NAME_CHECK_PAGE_SIZE,
      });
      return page.items.some(
        (item) =>
          nameSortKey(readString(item, 'name').trim()) === target &&
          readString(item, 'brand_id') !== excludeBrandId
      );
    } catch (error) {
      this.logger.warn('Brand name uniqueness check failed, assuming no duplicate', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private now(): string {
    return this.options.clock().toISOString();
  }
}
