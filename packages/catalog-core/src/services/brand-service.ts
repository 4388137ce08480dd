/**
 * Brand Service
 *
 * Accepts raw request payloads, normalizes them into typed inputs and reports
 * outcomes as Results.
 */

import type { BrandRepository } from '../db/brand-repository';
import type { Result } from '../errors/result';
import type { Brand } from '../types/brand';
import type { ListOptions, Page } from '../types/common';
import { componentLogger, type Logger } from '../utils/logger';
import { validateBrandUpdate, validateCreateBrand } from '../validators/brand-validators';
import { listOptions, runOperation } from './operation';

export class BrandService {
  private readonly logger: Logger;

  constructor(
    private readonly brands: BrandRepository,
    logger: Logger
  ) {
    this.logger = componentLogger(logger, 'brand-service');
  }

  async create(payload: unknown): Promise<Result<Brand>> {
    return runOperation(this.logger, 'createBrand', () =>
      this.brands.create(validateCreateBrand(payload))
    );
  }

  async get(brandId: string): Promise<Result<Brand | null>> {
    return runOperation(this.logger, 'getBrand', () => this.brands.get(brandId.trim()));
  }

  async update(brandId: string, payload: unknown): Promise<Result<Brand>> {
    return runOperation(this.logger, 'updateBrand', () =>
      this.brands.update(brandId.trim(), validateBrandUpdate(payload))
    );
  }

  async delete(brandId: string): Promise<Result<boolean>> {
    return runOperation(this.logger, 'deleteBrand', () => this.brands.delete(brandId.trim()));
  }

  async list(options?: ListOptions): Promise<Result<Page<Brand>>> {
    return runOperation(this.logger, 'listBrands', () => this.brands.list(listOptions(options)));
  }
}
