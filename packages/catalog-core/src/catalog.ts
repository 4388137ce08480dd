/**
 * Catalog assembly
 *
 * Wires repositories and services over one store. The process bootstrap
 * builds a catalog once and reuses it across invocations.
 */

import { BrandRepository } from './db/brand-repository';
import { CategoryRepository } from './db/category-repository';
import { ProductRepository } from './db/product-repository';
import type { RepositoryOptions } from './db/repository-options';
import type { CatalogStore } from './db/store';
import { BrandService } from './services/brand-service';
import { CategoryService } from './services/category-service';
import { ProductService } from './services/product-service';
import { componentLogger, type Logger } from './utils/logger';

export interface CatalogRepositories {
  brands: BrandRepository;
  categories: CategoryRepository;
  products: ProductRepository;
}

export interface Catalog {
  brands: BrandService;
  categories: CategoryService;
  products: ProductService;
  repositories: CatalogRepositories;
}

export function createCatalog(
  store: CatalogStore,
  logger: Logger,
  options?: RepositoryOptions
): Catalog {
  const repositories: CatalogRepositories = {
    brands: new BrandRepository(store, componentLogger(logger, 'brand-repository'), options),
    categories: new CategoryRepository(store, componentLogger(logger, 'category-repository'), options),
    products: new ProductRepository(store, componentLogger(logger, 'product-repository'), options),
  };

  return {
    brands: new BrandService(repositories.brands, logger),
    categories: new CategoryService(repositories.categories, logger),
    products: new ProductService(repositories.products, logger),
    repositories,
  };
}
