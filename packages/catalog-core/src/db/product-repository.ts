/**
 * Product Repository
 *
 * Every product is stored twice: the detail item (`PRODUCT#{id}`, listed per
 * category through GSI-3 and per brand through GSI-2) and the list projection
 * (`PRODUCT_LIST#{id}`, listed catalog-wide by name). The two are written one
 * after the other; a failure between the writes leaves them out of step.
 */

import { NotFoundError, ValidationError } from '../errors/catalog-error';
import type { ListOptions, Page } from '../types/common';
import type { CreateProductInput, Product, UpdateProductFields } from '../types/product';
import type { Logger } from '../utils/logger';
import {
  validateCreateProduct,
  validateProductUpdate,
  validateStockQuantity,
} from '../validators/product-validators';
import { PREFIX } from './constants';
import {
  buildProductItem,
  buildProductListItem,
  itemToProduct,
  listItemToProduct,
  productUpdateStatements,
  softDeleteStatement,
} from './items';
import {
  brandKeys,
  brandProductsIndex,
  categoryKeys,
  categoryProductsIndex,
  type ItemKey,
  productKeys,
  productListIndex,
  productListKeys,
  typePrefixIndex,
} from './keys';
import {
  mapPage,
  pageLimit,
  type RepositoryOptions,
  type ResolvedRepositoryOptions,
  resolveRepositoryOptions,
} from './repository-options';
import type { CatalogStore } from './store';

export class ProductRepository {
  private readonly options: ResolvedRepositoryOptions;

  constructor(
    private readonly store: CatalogStore,
    private readonly logger: Logger,
    options?: RepositoryOptions
  ) {
    this.options = resolveRepositoryOptions(options);
  }

  /**
   * Create a product and its list projection
   * @throws ValidationError, NotFoundError (unknown brand or category)
   */
  async create(input: CreateProductInput): Promise<Product> {
    const validated = validateCreateProduct(input);

    await this.requireBrand(validated.brand_id);
    await this.requireCategory(validated.category_id);

    const productId = this.options.generateId();
    const now = this.now();
    await this.store.put(buildProductItem(productId, validated, now), 'item_not_exists');
    await this.store.put(buildProductListItem(productId, validated, now), 'item_not_exists');

    this.logger.info('Product created', { productId });
    return {
      product_id: productId,
      name: validated.name,
      brand_id: validated.brand_id,
      category_id: validated.category_id,
      price: validated.price,
      stock_quantity: validated.stock_quantity ?? 0,
      ...(validated.description ? { description: validated.description } : {}),
      ...(validated.images ? { images: validated.images } : {}),
      created_at: now,
      updated_at: now,
    };
  }

  async get(productId: string): Promise<Product | null> {
    if (!productId) {
      return null;
    }
    const item = await this.store.get(productKeys(productId));
    return item ? itemToProduct(item) : null;
  }

  /**
   * Apply a partial update to the detail item, then mirror it into the projection.
   * References are checked before anything is written.
   * @throws ValidationError, NotFoundError
   */
  async update(productId: string, fields: UpdateProductFields): Promise<Product> {
    const validated = validateProductUpdate(fields);

    if (!(await this.exists(productId))) {
      throw new NotFoundError(`Product with ID '${productId}' not found`);
    }
    if (validated.brand_id !== undefined) {
      await this.requireBrand(validated.brand_id);
    }
    if (validated.category_id !== undefined) {
      await this.requireCategory(validated.category_id);
    }

    const statements = productUpdateStatements(validated, this.now());
    const item = await this.store.update(productKeys(productId), statements.detail, 'item_exists');
    await this.mirrorToProjection(productId, () =>
      this.store.update(productListKeys(productId), statements.projection, 'item_exists')
    );

    this.logger.info('Product updated', { productId, fields: Object.keys(validated) });
    return itemToProduct(item);
  }

  /**
   * Delete a product and its projection. Returns false when it does not exist.
   */
  async delete(productId: string): Promise<boolean> {
    if (!(await this.exists(productId))) {
      return false;
    }

    if (this.options.softDelete) {
      const statement = softDeleteStatement(this.now());
      await this.store.update(productKeys(productId), statement, 'item_exists');
      await this.mirrorToProjection(productId, () =>
        this.store.update(productListKeys(productId), statement, 'item_exists')
      );
    } else {
      const deleted = await this.store.delete(productKeys(productId));
      await this.store.delete(productListKeys(productId));
      if (deleted === null) {
        return false;
      }
    }

    this.logger.info('Product deleted', { productId, soft: this.options.softDelete });
    return true;
  }

  async exists(productId: string): Promise<boolean> {
    if (!productId) {
      return false;
    }
    return this.store.exists(productKeys(productId));
  }

  /**
   * List products ordered by name, from the projections
   */
  async list(options: ListOptions = {}): Promise<Page<Product>> {
    const page = await this.store.queryByIndex({
      index: productListIndex(),
      limit: pageLimit(options.limit),
      continuationToken: options.continuationToken,
    });
    return mapPage(page, listItemToProduct);
  }

  /**
   * Products of a brand, ordered by product id (GSI-2)
   */
  async listByBrand(brandId: string, options: ListOptions = {}): Promise<Page<Product>> {
    const page = await this.store.queryByIndex({
      index: brandProductsIndex(brandId),
      limit: pageLimit(options.limit),
      continuationToken: options.continuationToken,
    });
    return mapPage(page, itemToProduct);
  }

  /**
   * Products of a category, ordered by product id (GSI-3 `CATEGORY#{id}`)
   */
  async listByCategory(categoryId: string, options: ListOptions = {}): Promise<Page<Product>> {
    const page = await this.store.queryByIndex({
      index: categoryProductsIndex(categoryId),
      limit: pageLimit(options.limit),
      continuationToken: options.continuationToken,
    });
    return mapPage(page, itemToProduct);
  }

  /**
   * Every product detail item found through the GSI-1 type prefix
   */
  async listByTypePrefix(options: ListOptions = {}): Promise<Page<Product>> {
    const page = await this.store.scanByPrefix({
      index: typePrefixIndex(PREFIX.PRODUCT),
      limit: pageLimit(options.limit),
      continuationToken: options.continuationToken,
    });
    return mapPage(page, itemToProduct);
  }

  /**
   * Set the absolute stock quantity
   * @throws ValidationError, NotFoundError
   */
  async setStock(productId: string, quantity: number): Promise<Product> {
    return this.update(productId, { stock_quantity: validateStockQuantity(quantity) });
  }

  /**
   * Add a signed delta to the current stock quantity
   * @throws ValidationError (non-integer delta or negative result), NotFoundError
   */
  async adjustStock(productId: string, delta: number): Promise<Product> {
    if (!Number.isInteger(delta)) {
      throw new ValidationError('Quantity change must be an integer', 'quantity_change');
    }

    const product = await this.get(productId);
    if (!product) {
      throw new NotFoundError(`Product with ID '${productId}' not found`);
    }

    const newStock = product.stock_quantity + delta;
    if (newStock < 0) {
      throw new ValidationError(
        'Stock quantity cannot be negative after adjustment',
        'stock_quantity'
      );
    }

    return this.setStock(productId, newStock);
  }

  private async requireBrand(brandId: string): Promise<void> {
    await this.requireReference(brandKeys(brandId), `Brand with ID '${brandId}' not found`);
  }

  private async requireCategory(categoryId: string): Promise<void> {
    await this.requireReference(
      categoryKeys(categoryId),
      `Category with ID '${categoryId}' not found`
    );
  }

  private async requireReference(key: ItemKey, message: string): Promise<void> {
    if (!(await this.store.exists(key))) {
      throw new NotFoundError(message);
    }
  }

  /**
   * Projection writes tolerate a missing projection: the detail item is the
   * source of truth and has already been written.
   */
  private async mirrorToProjection(productId: string, write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      this.logger.warn('Product list projection missing', { productId });
    }
  }

  private now(): string {
    return this.options.clock().toISOString();
  }
}
