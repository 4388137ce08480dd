/**
 * Category Service
 *
 * Accepts raw request payloads, normalizes them into typed inputs and reports
 * outcomes as Results.
 */

import type { CategoryRepository } from '../db/category-repository';
import type { Result } from '../errors/result';
import type { Category } from '../types/category';
import type { ListOptions, Page } from '../types/common';
import { componentLogger, type Logger } from '../utils/logger';
import { validateCategoryUpdate, validateCreateCategory } from '../validators/category-validators';
import { listOptions, runOperation } from './operation';

export class CategoryService {
  private readonly logger: Logger;

  constructor(
    private readonly categories: CategoryRepository,
    logger: Logger
  ) {
    this.logger = componentLogger(logger, 'category-service');
  }

  async create(payload: unknown): Promise<Result<Category>> {
    return runOperation(this.logger, 'createCategory', () =>
      this.categories.create(validateCreateCategory(payload))
    );
  }

  async get(categoryId: string): Promise<Result<Category | null>> {
    return runOperation(this.logger, 'getCategory', () => this.categories.get(categoryId.trim()));
  }

  async update(categoryId: string, payload: unknown): Promise<Result<Category>> {
    return runOperation(this.logger, 'updateCategory', () =>
      this.categories.update(categoryId.trim(), validateCategoryUpdate(payload))
    );
  }

  async delete(categoryId: string): Promise<Result<boolean>> {
    return runOperation(this.logger, 'deleteCategory', () => this.categories.delete(categoryId.trim()));
  }

  async list(options?: ListOptions): Promise<Result<Page<Category>>> {
    return runOperation(this.logger, 'listCategories', () => this.categories.list(listOptions(options)));
  }
}
