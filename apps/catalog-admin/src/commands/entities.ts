/**
 * Entity listing commands
 */

import type { Brand, Category, ListOptions, Page, Product, Result } from '@catalog/catalog-core';
import { Command, InvalidArgumentError } from 'commander';
import { type GlobalOptions, openCatalog } from '../context';
import { error, getOutputFormat, info, printData, printJson, type TableConfig } from '../utils/output';

interface ListCommandOptions {
  limit?: number;
  lastKey?: string;
}

interface ProductListOptions extends ListCommandOptions {
  brand?: string;
  category?: string;
}

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return limit;
}

function toListOptions(options: ListCommandOptions): ListOptions {
  return { limit: options.limit, continuationToken: options.lastKey ?? null };
}

/**
 * Print one page, or report the failure and set a failing exit code
 */
export function printPage<T>(result: Result<Page<T>>, table: TableConfig<T>): void {
  if (!result.success) {
    error(`${result.error.code}: ${result.error.message}`);
    process.exitCode = 1;
    return;
  }

  if (getOutputFormat() === 'json') {
    printJson(result.data);
    return;
  }
  printData(result.data.items, table);
  if (result.data.nextContinuationToken) {
    info(`Next page: --last-key ${result.data.nextContinuationToken}`);
  }
}

export const BRAND_TABLE: TableConfig<Brand> = {
  headers: ['BRAND ID', 'NAME', 'WEBSITE', 'UPDATED'],
  getRow: (brand) => [brand.brand_id, brand.name, brand.website ?? '', brand.updated_at],
};

export const CATEGORY_TABLE: TableConfig<Category> = {
  headers: ['CATEGORY ID', 'NAME', 'UPDATED'],
  getRow: (category) => [category.category_id, category.name, category.updated_at],
};

export const PRODUCT_TABLE: TableConfig<Product> = {
  headers: ['PRODUCT ID', 'NAME', 'PRICE', 'STOCK', 'BRAND ID', 'CATEGORY ID'],
  getRow: (product) => [
    product.product_id,
    product.name,
    product.price.toFixed(2),
    String(product.stock_quantity),
    product.brand_id,
    product.category_id,
  ],
};

function withListOptions(command: Command): Command {
  return command
    .option('--limit <n>', 'Page size (1-100)', parseLimit)
    .option('--last-key <token>', 'Continuation token from the previous page');
}

export function createBrandsCommand(): Command {
  const brands = new Command('brands').description('Brand listing');

  withListOptions(brands.command('list').description('List brands ordered by name')).action(
    async (options: ListCommandOptions, command: Command) => {
      const { catalog } = openCatalog(command.optsWithGlobals<GlobalOptions>());
      printPage(await catalog.brands.list(toListOptions(options)), BRAND_TABLE);
    }
  );

  return brands;
}

export function createCategoriesCommand(): Command {
  const categories = new Command('categories').description('Category listing');

  withListOptions(categories.command('list').description('List categories ordered by name')).action(
    async (options: ListCommandOptions, command: Command) => {
      const { catalog } = openCatalog(command.optsWithGlobals<GlobalOptions>());
      printPage(await catalog.categories.list(toListOptions(options)), CATEGORY_TABLE);
    }
  );

  return categories;
}

export function createProductsCommand(): Command {
  const products = new Command('products').description('Product listing');

  withListOptions(
    products
      .command('list')
      .description('List products by name, or those of one brand or category')
      .option('--brand <brandId>', 'Only products of this brand')
      .option('--category <categoryId>', 'Only products of this category')
  ).action(async (options: ProductListOptions, command: Command) => {
    if (options.brand && options.category) {
      error('Use either --brand or --category, not both');
      process.exitCode = 1;
      return;
    }

    const { catalog } = openCatalog(command.optsWithGlobals<GlobalOptions>());
    const listOptions = toListOptions(options);
    const result = options.brand
      ? await catalog.products.listByBrand(options.brand, listOptions)
      : options.category
        ? await catalog.products.listByCategory(options.category, listOptions)
        : await catalog.products.list(listOptions);
    printPage(result, PRODUCT_TABLE);
  });

  return products;
}
