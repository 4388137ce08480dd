/**
 * Item builders
 *
 * Assemble the full attribute map of each item, including the denormalized
 * index attributes, and the fixed per-entity update statements.
 */

import { DatabaseError } from '../errors/catalog-error';
import type { Brand, BrandItem, CreateBrandInput, UpdateBrandFields } from '../types/brand';
import type {
  Category,
  CategoryItem,
  CreateCategoryInput,
  UpdateCategoryFields,
} from '../types/category';
import type {
  CreateProductInput,
  Product,
  ProductItem,
  ProductListItem,
  UpdateProductFields,
} from '../types/product';
import { ENTITY_TYPE, LIST_PARTITION, PREFIX } from './constants';
import {
  readNumber,
  readOptionalString,
  readOptionalStringList,
  readString,
} from './item-readers';
import {
  brandKeys,
  categoryKeys,
  categoryProductsPartition,
  extractId,
  nameSortKey,
  productKeys,
  productListKeys,
} from './keys';
import type { CatalogItem, UpdateStatement } from './store';

/**
 * Fields accepted by each update, checked against the field types at compile time
 */
export const BRAND_UPDATE_FIELDS = [
  'name',
  'description',
  'website',
] as const satisfies readonly (keyof UpdateBrandFields)[];
export const CATEGORY_UPDATE_FIELDS = [
  'name',
  'description',
] as const satisfies readonly (keyof UpdateCategoryFields)[];
export const PRODUCT_UPDATE_FIELDS = [
  'name',
  'brand_id',
  'category_id',
  'price',
  'stock_quantity',
  'description',
  'images',
] as const satisfies readonly (keyof UpdateProductFields)[];

// === Brand ===

export function buildBrandItem(brandId: string, input: CreateBrandInput, now: string): BrandItem {
  return {
    ...brandKeys(brandId),
    GSI3PK: LIST_PARTITION.BRAND,
    GSI3SK: nameSortKey(input.name),
    entity_type: ENTITY_TYPE.BRAND,
    brand_id: brandId,
    name: input.name,
    description: input.description,
    ...(input.website ? { website: input.website } : {}),
    created_at: now,
    updated_at: now,
  };
}

export function brandUpdateStatement(fields: UpdateBrandFields, now: string): UpdateStatement {
  const statement: UpdateStatement = { set: { updated_at: now }, remove: [] };

  if (fields.name !== undefined) {
    statement.set.name = fields.name;
    statement.set.GSI3SK = nameSortKey(fields.name);
  }
  if (fields.description !== undefined) {
    statement.set.description = fields.description;
  }
  if (fields.website === null) {
    statement.remove.push('website');
  } else if (fields.website !== undefined) {
    statement.set.website = fields.website;
  }

  return statement;
}

export function itemToBrand(item: CatalogItem): Brand {
  const website = readOptionalString(item, 'website');
  return {
    brand_id: readString(item, 'brand_id'),
    name: readString(item, 'name'),
    description: readString(item, 'description'),
    ...(website ? { website } : {}),
    created_at: readString(item, 'created_at'),
    updated_at: readString(item, 'updated_at'),
  };
}

// === Category ===

export function buildCategoryItem(
  categoryId: string,
  input: CreateCategoryInput,
  now: string
): CategoryItem {
  return {
    ...categoryKeys(categoryId),
    GSI3PK: LIST_PARTITION.CATEGORY,
    GSI3SK: nameSortKey(input.name),
    entity_type: ENTITY_TYPE.CATEGORY,
    category_id: categoryId,
    name: input.name,
    description: input.description,
    created_at: now,
    updated_at: now,
  };
}

export function categoryUpdateStatement(fields: UpdateCategoryFields, now: string): UpdateStatement {
  const statement: UpdateStatement = { set: { updated_at: now }, remove: [] };

  if (fields.name !== undefined) {
    statement.set.name = fields.name;
    statement.set.GSI3SK = nameSortKey(fields.name);
  }
  if (fields.description !== undefined) {
    statement.set.description = fields.description;
  }

  return statement;
}

export function itemToCategory(item: CatalogItem): Category {
  return {
    category_id: readString(item, 'category_id'),
    name: readString(item, 'name'),
    description: readString(item, 'description'),
    created_at: readString(item, 'created_at'),
    updated_at: readString(item, 'updated_at'),
  };
}

// === Product ===

function productAttributes(input: CreateProductInput, now: string) {
  return {
    name: input.name,
    brand_id: input.brand_id,
    category_id: input.category_id,
    price: input.price,
    stock_quantity: input.stock_quantity ?? 0,
    ...(input.description ? { description: input.description } : {}),
    ...(input.images && input.images.length > 0 ? { images: input.images } : {}),
    created_at: now,
    updated_at: now,
  };
}

/**
 * Detail item. `brand_id` + `product_id` place it in GSI-2, `GSI3PK` in its
 * category's partition of GSI-3.
 */
export function buildProductItem(
  productId: string,
  input: CreateProductInput,
  now: string
): ProductItem {
  return {
    ...productKeys(productId),
    GSI3PK: categoryProductsPartition(input.category_id),
    GSI3SK: productId,
    entity_type: ENTITY_TYPE.PRODUCT,
    product_id: productId,
    ...productAttributes(input, now),
  };
}

/**
 * List projection item, pinned to the `PRODUCT_LIST` partition of GSI-3
 */
export function buildProductListItem(
  productId: string,
  input: CreateProductInput,
  now: string
): ProductListItem {
  return {
    ...productListKeys(productId),
    GSI3PK: LIST_PARTITION.PRODUCT,
    GSI3SK: nameSortKey(input.name),
    entity_type: ENTITY_TYPE.PRODUCT_LIST,
    ...productAttributes(input, now),
  };
}

/**
 * Update statements for both product items.
 *
 * The projection receives every shared field but never `GSI3PK`: a category
 * change moves the detail item to the new category partition while the
 * projection stays in `PRODUCT_LIST`.
 */
export function productUpdateStatements(
  fields: UpdateProductFields,
  now: string
): { detail: UpdateStatement; projection: UpdateStatement } {
  const shared: UpdateStatement = { set: { updated_at: now }, remove: [] };

  if (fields.name !== undefined) shared.set.name = fields.name;
  if (fields.brand_id !== undefined) shared.set.brand_id = fields.brand_id;
  if (fields.category_id !== undefined) shared.set.category_id = fields.category_id;
  if (fields.price !== undefined) shared.set.price = fields.price;
  if (fields.stock_quantity !== undefined) shared.set.stock_quantity = fields.stock_quantity;

  if (fields.description === null) {
    shared.remove.push('description');
  } else if (fields.description !== undefined) {
    shared.set.description = fields.description;
  }
  if (fields.images === null) {
    shared.remove.push('images');
  } else if (fields.images !== undefined) {
    shared.set.images = fields.images;
  }

  const detail: UpdateStatement = { set: { ...shared.set }, remove: [...shared.remove] };
  if (fields.category_id !== undefined) {
    detail.set.GSI3PK = categoryProductsPartition(fields.category_id);
  }

  const projection: UpdateStatement = { set: { ...shared.set }, remove: [...shared.remove] };
  if (fields.name !== undefined) {
    projection.set.GSI3SK = nameSortKey(fields.name);
  }

  return { detail, projection };
}

export function itemToProduct(item: CatalogItem): Product {
  return {
    product_id: readString(item, 'product_id'),
    ...sharedProductFields(item),
  };
}

/**
 * Convert a list projection back to a Product, recovering the id from its key
 */
export function listItemToProduct(item: CatalogItem): Product {
  const productId = extractId(PREFIX.PRODUCT_LIST, readString(item, 'PK'));
  if (productId === null) {
    throw new DatabaseError(`Not a product list item: ${String(item.PK)}`, 'read');
  }
  return {
    product_id: productId,
    ...sharedProductFields(item),
  };
}

function sharedProductFields(item: CatalogItem): Omit<Product, 'product_id'> {
  const description = readOptionalString(item, 'description');
  const images = readOptionalStringList(item, 'images');
  return {
    name: readString(item, 'name'),
    brand_id: readString(item, 'brand_id'),
    category_id: readString(item, 'category_id'),
    price: readNumber(item, 'price'),
    stock_quantity: readNumber(item, 'stock_quantity'),
    ...(description ? { description } : {}),
    ...(images && images.length > 0 ? { images } : {}),
    created_at: readString(item, 'created_at'),
    updated_at: readString(item, 'updated_at'),
  };
}

// === Soft delete ===

/**
 * Marks an item deleted and drops it out of the GSI-3 lists
 */
export function softDeleteStatement(now: string): UpdateStatement {
  return {
    set: { deleted_at: now, updated_at: now },
    remove: ['GSI3PK', 'GSI3SK'],
  };
}
