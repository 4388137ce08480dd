/**
 * Product Entity Types
 */

import type { Timestamps } from './common';

/**
 * Product entity
 */
export interface Product extends Timestamps {
  product_id: string;
  name: string;
  /** Owning brand, must reference an existing Brand */
  brand_id: string;
  /** Owning category, must reference an existing Category */
  category_id: string;
  /** 0 to 999,999.99 with at most two decimal places */
  price: number;
  /** Whole number of units in stock, 0 to 999,999 */
  stock_quantity: number;
  description?: string;
  /** Up to 10 image URLs */
  images?: string[];
}

/**
 * Detail item: `PRODUCT#{id}`, listed per category through GSI-3 and per brand through GSI-2
 */
export interface ProductItem extends Product {
  PK: string;
  SK: string;
  GSI3PK: string;
  GSI3SK: string;
  entity_type: 'product';
  deleted_at?: string;
}

/**
 * List projection item: `PRODUCT_LIST#{id}`, listed catalog-wide by name through GSI-3.
 *
 * It carries no `product_id` attribute so that GSI-2 (brand_id/product_id) stays
 * limited to detail items; the id is recovered from the key.
 */
export interface ProductListItem extends Omit<Product, 'product_id'> {
  PK: string;
  SK: string;
  GSI3PK: string;
  GSI3SK: string;
  entity_type: 'product_list';
  deleted_at?: string;
}

export interface CreateProductInput {
  name: string;
  brand_id: string;
  category_id: string;
  price: number;
  stock_quantity?: number;
  description?: string;
  images?: string[];
}

/**
 * Partial product update. `description: null` and `images: null` clear the field.
 */
export interface UpdateProductFields {
  name?: string;
  brand_id?: string;
  category_id?: string;
  price?: number;
  stock_quantity?: number;
  description?: string | null;
  images?: string[] | null;
}
