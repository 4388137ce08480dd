/**
 * Category Entity Types
 */

import type { Timestamps } from './common';

export interface Category extends Timestamps {
  category_id: string;
  name: string;
  description: string;
}

/**
 * DynamoDB item structure for Category
 */
export interface CategoryItem extends Category {
  PK: string;
  SK: string;
  GSI3PK: string;
  GSI3SK: string;
  entity_type: 'category';
  deleted_at?: string;
}

export interface CreateCategoryInput {
  name: string;
  description: string;
}

export interface UpdateCategoryFields {
  name?: string;
  description?: string;
}
