import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors/catalog-error';
import { validateBrandUpdate, validateCreateBrand } from './brand-validators';
import { validateCategoryUpdate, validateCreateCategory } from './category-validators';
import {
  validateCreateProduct,
  validateImages,
  validatePrice,
  validateProductUpdate,
  validateStockQuantity,
} from './product-validators';

const BRAND_ID = '11111111-1111-4111-8111-111111111111';
const CATEGORY_ID = '22222222-2222-4222-8222-222222222222';

function validationMessage(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.message;
    }
    throw error;
  }
  return undefined;
}

describe('brand validation', () => {
  it('should enforce name length bounds', () => {
    expect(validationMessage(() => validateCreateBrand({ name: 'A', description: 'Ten chars!' }))).toBe(
      'Brand name must be at least 2 characters long'
    );
    expect(validateCreateBrand({ name: 'AB', description: 'Ten chars!' }).name).toBe('AB');
    expect(
      validationMessage(() => validateCreateBrand({ name: 'x'.repeat(101), description: 'Ten chars!' }))
    ).toBe('Brand name cannot exceed 100 characters');
  });

  it('should enforce description length bounds', () => {
    expect(validationMessage(() => validateCreateBrand({ name: 'Acme', description: 'Nine char' }))).toBe(
      'Brand description must be at least 10 characters long'
    );
    expect(validateCreateBrand({ name: 'Acme', description: 'Ten chars!' }).description).toBe(
      'Ten chars!'
    );
  });

  it('should trim values before checking them', () => {
    expect(validateCreateBrand({ name: '  Acme  ', description: '  A fine brand  ' })).toEqual({
      name: 'Acme',
      description: 'A fine brand',
    });
    expect(validationMessage(() => validateCreateBrand({ name: '   ', description: 'A fine brand' }))).toBe(
      'Brand name cannot be empty or whitespace'
    );
  });

  it('should report missing and mistyped fields', () => {
    expect(validationMessage(() => validateCreateBrand({ description: 'A fine brand' }))).toBe(
      'Brand name is required'
    );
    expect(validationMessage(() => validateCreateBrand({ name: 7, description: 'A fine brand' }))).toBe(
      'Brand name must be a string'
    );
    expect(validationMessage(() => validateCreateBrand('Acme'))).toBe(
      'Request body must be a JSON object'
    );
  });

  it('should reject names outside the allowed charset', () => {
    expect(validationMessage(() => validateCreateBrand({ name: 'Acme<script>', description: 'A fine brand' }))).toBe(
      'Brand name contains invalid characters'
    );
    expect(validateCreateBrand({ name: 'A&B Tools_Co.-1', description: 'A fine brand' }).name).toBe(
      'A&B Tools_Co.-1'
    );
  });

  it('should accept only http(s) websites and drop blank ones', () => {
    const base = { name: 'Acme', description: 'A fine brand' };
    expect(validateCreateBrand({ ...base, website: 'https://acme.test' }).website).toBe('https://acme.test');
    expect(validateCreateBrand({ ...base, website: '   ' })).toEqual(base);
    expect(validationMessage(() => validateCreateBrand({ ...base, website: 'acme dot test' }))).toBe(
      'Invalid website URL format'
    );
    expect(validationMessage(() => validateCreateBrand({ ...base, website: 'ftp://acme.test' }))).toBe(
      'Website URL must use http or https protocol'
    );
  });

  it('should parse partial updates against the allow-list', () => {
    expect(validateBrandUpdate({ name: ' Zeta ', website: '' })).toEqual({ name: 'Zeta', website: null });
    expect(validationMessage(() => validateBrandUpdate({ name: 'Zeta', color: 'red', size: 1 }))).toBe(
      'Invalid fields: color, size'
    );
    expect(validationMessage(() => validateBrandUpdate({}))).toBe('No valid fields to update');
  });
});

describe('category validation', () => {
  it('should apply the same rules as brands under its own labels', () => {
    expect(validationMessage(() => validateCreateCategory({ name: 'G', description: 'Electronic gadgets' }))).toBe(
      'Category name must be at least 2 characters long'
    );
    expect(validationMessage(() => validateCategoryUpdate({ website: 'https://x.test' }))).toBe(
      'Invalid fields: website'
    );
    expect(validateCategoryUpdate({ description: ' Electronic gadgets ' })).toEqual({
      description: 'Electronic gadgets',
    });
  });
});

describe('product validation', () => {
  const base = { name: 'Widget', brand_id: BRAND_ID, category_id: CATEGORY_ID, price: 19.99 };

  it('should default stock to zero and drop blank optional fields', () => {
    expect(validateCreateProduct({ ...base, description: '  ', images: [] })).toEqual({
      ...base,
      stock_quantity: 0,
    });
  });

  it('should allow product-specific punctuation in names', () => {
    expect(validateCreateProduct({ ...base, name: 'Widget (2-pack), "Pro" / Max! +1' }).name).toBe(
      'Widget (2-pack), "Pro" / Max! +1'
    );
    expect(validationMessage(() => validateCreateProduct({ ...base, name: 'Widget#1' }))).toBe(
      'Product name contains invalid characters'
    );
  });

  it('should require UUID references', () => {
    expect(validationMessage(() => validateCreateProduct({ ...base, brand_id: 'acme' }))).toBe(
      'Brand ID must be a valid UUID'
    );
    expect(validationMessage(() => validateCreateProduct({ ...base, category_id: undefined }))).toBe(
      'Category ID is required'
    );
  });

  it('should enforce price bounds and precision', () => {
    expect(validatePrice(999999.99)).toBe(999999.99);
    expect(validatePrice(0)).toBe(0);
    expect(validationMessage(() => validatePrice(1000000))).toBe('Price cannot exceed 999,999.99');
    expect(validationMessage(() => validatePrice(-0.01))).toBe('Price cannot be negative');
    expect(validationMessage(() => validatePrice(1.999))).toBe(
      'Price cannot have more than 2 decimal places'
    );
    for (const price of [1.000000001, 19.990000001, 1e-9]) {
      expect(validationMessage(() => validatePrice(price))).toBe(
        'Price cannot have more than 2 decimal places'
      );
    }
    expect(validatePrice(19.9)).toBe(19.9);
    expect(validatePrice(0.01)).toBe(0.01);
    expect(validationMessage(() => validatePrice('19.99'))).toBe('Price must be a number');
  });

  it('should enforce whole, bounded stock quantities', () => {
    expect(validateStockQuantity(0)).toBe(0);
    expect(validateStockQuantity(999999)).toBe(999999);
    expect(validationMessage(() => validateStockQuantity(-1))).toBe('Stock quantity cannot be negative');
    expect(validationMessage(() => validateStockQuantity(1.5))).toBe('Stock quantity must be a whole number');
    expect(validationMessage(() => validateStockQuantity(1000000))).toBe(
      'Stock quantity cannot exceed 999,999'
    );
  });

  it('should validate image URLs by position', () => {
    expect(validateImages([' https://cdn.test/a.PNG ', 'http://cdn.test/b.webp?w=200'])).toEqual([
      'https://cdn.test/a.PNG',
      'http://cdn.test/b.webp?w=200',
    ]);
    expect(validationMessage(() => validateImages(['https://cdn.test/a.png', 'https://cdn.test/b.pdf']))).toBe(
      'Image 2 must be a valid image URL (jpg, jpeg, png, gif, webp)'
    );
    expect(
      validationMessage(() => validateImages(Array.from({ length: 11 }, (_, i) => `https://cdn.test/${i}.jpg`)))
    ).toBe('Cannot have more than 10 images');
    expect(validationMessage(() => validateImages('https://cdn.test/a.png'))).toBe('Images must be a list');
  });

  it('should parse updates with clearing semantics', () => {
    expect(validateProductUpdate({ description: '', images: [], price: 5 })).toEqual({
      description: null,
      images: null,
      price: 5,
    });
    expect(validationMessage(() => validateProductUpdate({ sku: 'W-1' }))).toBe('Invalid fields: sku');
  });

  it('should attach the offending field to the error', () => {
    try {
      validateCreateProduct({ ...base, price: 1.234 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'price', code: 'VALIDATION_ERROR' });
    }
  });
});
