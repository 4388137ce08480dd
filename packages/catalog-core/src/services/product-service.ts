/**
 * Product Service
 */

import type { ProductRepository } from '../db/product-repository';
import type { Result } from '../errors/result';
import type { ListOptions, Page } from '../types/common';
import type { Product } from '../types/product';
import { componentLogger, type Logger } from '../utils/logger';
import { validateCreateProduct, validateProductUpdate } from '../validators/product-validators';
import { listOptions, runOperation } from './operation';

export class ProductService {
  private readonly logger: Logger;

  constructor(
    private readonly products: ProductRepository,
    logger: Logger
  ) {
    this.logger = componentLogger(logger, 'product-service');
  }

  /**
   * Create a product. `stock_quantity` defaults to 0.
   */
  async create(payload: unknown): Promise<Result<Product>> {
    return runOperation(this.logger, 'createProduct', () =>
      this.products.create(validateCreateProduct(payload))
    );
  }

  async get(productId: string): Promise<Result<Product | null>> {
    return runOperation(this.logger, 'getProduct', () => this.products.get(productId.trim()));
  }

  async update(productId: string, payload: unknown): Promise<Result<Product>> {
    return runOperation(this.logger, 'updateProduct', () =>
      this.products.update(productId.trim(), validateProductUpdate(payload))
    );
  }

  async delete(productId: string): Promise<Result<boolean>> {
    return runOperation(this.logger, 'deleteProduct', () => this.products.delete(productId.trim()));
  }

  async list(options?: ListOptions): Promise<Result<Page<Product>>> {
    return runOperation(this.logger, 'listProducts', () =>
      this.products.list(listOptions(options))
    );
  }

  async listByBrand(brandId: string, options?: ListOptions): Promise<Result<Page<Product>>> {
    return runOperation(this.logger, 'listProductsByBrand', () =>
      this.products.listByBrand(brandId.trim(), listOptions(options))
    );
  }

  async listByCategory(categoryId: string, options?: ListOptions): Promise<Result<Page<Product>>> {
    return runOperation(this.logger, 'listProductsByCategory', () =>
      this.products.listByCategory(categoryId.trim(), listOptions(options))
    );
  }

  /**
   * Set the absolute stock quantity
   */
  async updateStock(productId: string, quantity: number): Promise<Result<Product>> {
    return runOperation(this.logger, 'updateStock', () =>
      this.products.setStock(productId.trim(), quantity)
    );
  }

  /**
   * Apply a relative stock change; the result may not drop below zero
   */
  async adjustStock(productId: string, quantityChange: number): Promise<Result<Product>> {
    return runOperation(this.logger, 'adjustStock', () =>
      this.products.adjustStock(productId.trim(), quantityChange)
    );
  }
}
