import { PRODUCT_UPDATE_FIELDS } from '../db/items';
import { ValidationError } from '../errors/catalog-error';
import type { CreateProductInput, UpdateProductFields } from '../types/product';
import {
  isBlank,
  rejectUnknownFields,
  requireRecord,
  requireText,
  requireUuid,
  type TextRule,
} from './common';

export const PRODUCT_NAME_RULE: TextRule = {
  label: 'Product name',
  min: 2,
  max: 200,
  pattern: /^[a-zA-Z0-9\s\-_&.,()'"/!+]+$/,
};

export const PRODUCT_DESCRIPTION_RULE: TextRule = {
  label: 'Product description',
  min: 10,
  max: 1000,
};

export const MAX_PRICE = 999_999.99;
export const MAX_STOCK_QUANTITY = 999_999;
export const MAX_IMAGES = 10;

const IMAGE_URL_PATTERN = /^https?:\/\/.+\.(jpg|jpeg|png|gif|webp)(\?.*)?$/i;

/**
 * Fraction digits of the shortest decimal form, so 1e-9 counts as 9
 */
function decimalPlaces(value: number): number {
  const match = /^-?\d+(?:\.(\d+))?(?:e([+-]\d+))?$/i.exec(String(value));
  if (!match) {
    return 0;
  }
  const fraction = match[1]?.length ?? 0;
  const exponent = match[2] ? Number(match[2]) : 0;
  return Math.max(0, fraction - exponent);
}

function hasAtMostTwoDecimals(value: number): boolean {
  return decimalPlaces(value) <= 2;
}

export function validatePrice(value: unknown): number {
  if (value === undefined || value === null) {
    throw new ValidationError('Price is required', 'price');
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError('Price must be a number', 'price');
  }
  if (value < 0) {
    throw new ValidationError('Price cannot be negative', 'price');
  }
  if (value > MAX_PRICE) {
    throw new ValidationError('Price cannot exceed 999,999.99', 'price');
  }
  if (!hasAtMostTwoDecimals(value)) {
    throw new ValidationError('Price cannot have more than 2 decimal places', 'price');
  }
  return value;
}

export function validateStockQuantity(value: unknown): number {
  if (value === undefined || value === null) {
    throw new ValidationError('Stock quantity is required', 'stock_quantity');
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError('Stock quantity must be an integer', 'stock_quantity');
  }
  if (!Number.isInteger(value)) {
    throw new ValidationError('Stock quantity must be a whole number', 'stock_quantity');
  }
  if (value < 0) {
    throw new ValidationError('Stock quantity cannot be negative', 'stock_quantity');
  }
  if (value > MAX_STOCK_QUANTITY) {
    throw new ValidationError('Stock quantity cannot exceed 999,999', 'stock_quantity');
  }
  return value;
}

/**
 * Up to ten http(s) image URLs; entries are trimmed
 */
export function validateImages(value: unknown): string[] {
  if (!Array.isArray(value)) {
    throw new ValidationError('Images must be a list', 'images');
  }
  if (value.length > MAX_IMAGES) {
    throw new ValidationError('Cannot have more than 10 images', 'images');
  }

  return value.map((entry: unknown, index) => {
    const position = index + 1;
    if (typeof entry !== 'string') {
      throw new ValidationError(`Image ${position} must be a string URL`, 'images');
    }
    const url = entry.trim();
    if (url.length === 0) {
      throw new ValidationError(`Image ${position} URL cannot be empty`, 'images');
    }
    if (!IMAGE_URL_PATTERN.test(url)) {
      throw new ValidationError(
        `Image ${position} must be a valid image URL (jpg, jpeg, png, gif, webp)`,
        'images'
      );
    }
    return url;
  });
}

export const validateBrandId = (value: unknown): string => requireUuid(value, 'brand_id', 'Brand ID');
export const validateCategoryId = (value: unknown): string =>
  requireUuid(value, 'category_id', 'Category ID');

/**
 * Validate and normalize product creation input.
 * Stock defaults to 0; a blank description and an empty image list are dropped.
 */
export function validateCreateProduct(input: unknown): CreateProductInput {
  const payload = requireRecord(input);

  const product: CreateProductInput = {
    name: requireText(payload.name, 'name', PRODUCT_NAME_RULE),
    brand_id: validateBrandId(payload.brand_id),
    category_id: validateCategoryId(payload.category_id),
    price: validatePrice(payload.price),
    stock_quantity:
      payload.stock_quantity === undefined ? 0 : validateStockQuantity(payload.stock_quantity),
  };

  if (!isBlank(payload.description)) {
    product.description = requireText(payload.description, 'description', PRODUCT_DESCRIPTION_RULE);
  }
  if (payload.images !== undefined && payload.images !== null) {
    const images = validateImages(payload.images);
    if (images.length > 0) {
      product.images = images;
    }
  }

  return product;
}

/**
 * Validate a partial product update. Blank description, null images or an
 * empty image list clear the field.
 */
export function validateProductUpdate(input: unknown): UpdateProductFields {
  const payload = requireRecord(input);
  rejectUnknownFields(payload, PRODUCT_UPDATE_FIELDS);

  const fields: UpdateProductFields = {};
  if ('name' in payload) {
    fields.name = requireText(payload.name, 'name', PRODUCT_NAME_RULE);
  }
  if ('brand_id' in payload) {
    fields.brand_id = validateBrandId(payload.brand_id);
  }
  if ('category_id' in payload) {
    fields.category_id = validateCategoryId(payload.category_id);
  }
  if ('price' in payload) {
    fields.price = validatePrice(payload.price);
  }
  if ('stock_quantity' in payload) {
    fields.stock_quantity = validateStockQuantity(payload.stock_quantity);
  }
  if ('description' in payload) {
    fields.description = isBlank(payload.description)
      ? null
      : requireText(payload.description, 'description', PRODUCT_DESCRIPTION_RULE);
  }
  if ('images' in payload) {
    if (payload.images === null) {
      fields.images = null;
    } else {
      const images = validateImages(payload.images);
      fields.images = images.length > 0 ? images : null;
    }
  }

  if (Object.keys(fields).length === 0) {
    throw new ValidationError('No valid fields to update');
  }
  return fields;
}
