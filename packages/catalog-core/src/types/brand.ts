/**
 * Brand Entity Types
 */

import type { Timestamps } from './common';

/**
 * Brand entity
 */
export interface Brand extends Timestamps {
  /** Primary identifier (UUID) */
  brand_id: string;
  /** Display name, unique case-insensitively */
  name: string;
  description: string;
  /** Optional http(s) URL */
  website?: string;
}

/**
 * DynamoDB item structure for Brand
 */
export interface BrandItem extends Brand {
  PK: string;
  SK: string;
  GSI3PK: string;
  GSI3SK: string;
  entity_type: 'brand';
  deleted_at?: string;
}

export interface CreateBrandInput {
  name: string;
  description: string;
  website?: string;
}

/**
 * Partial brand update. `website: null` clears the website.
 */
export interface UpdateBrandFields {
  name?: string;
  description?: string;
  website?: string | null;
}
