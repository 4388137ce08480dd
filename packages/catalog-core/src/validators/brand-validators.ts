import { BRAND_UPDATE_FIELDS } from '../db/items';
import { ValidationError } from '../errors/catalog-error';
import type { CreateBrandInput, UpdateBrandFields } from '../types/brand';
import { isBlank, rejectUnknownFields, requireRecord, requireText, type TextRule } from './common';

export const BRAND_NAME_RULE: TextRule = {
  label: 'Brand name',
  min: 2,
  max: 100,
  pattern: /^[a-zA-Z0-9\s\-_&.]+$/,
};

export const BRAND_DESCRIPTION_RULE: TextRule = {
  label: 'Brand description',
  min: 10,
  max: 500,
};

/**
 * Website must parse as a URL with an http or https scheme
 */
export function validateWebsite(value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError('Website must be a string', 'website');
  }

  const trimmed = value.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ValidationError('Invalid website URL format', 'website');
  }
  if (!['http:', 'https:'].includes(url.protocol)) {
    throw new ValidationError('Website URL must use http or https protocol', 'website');
  }
  return trimmed;
}

/**
 * Validate and normalize brand creation input. A blank website is dropped.
 */
export function validateCreateBrand(input: unknown): CreateBrandInput {
  const payload = requireRecord(input);

  const name = requireText(payload.name, 'name', BRAND_NAME_RULE);
  const description = requireText(payload.description, 'description', BRAND_DESCRIPTION_RULE);

  if (isBlank(payload.website)) {
    return { name, description };
  }
  return { name, description, website: validateWebsite(payload.website) };
}

/**
 * Validate a partial brand update. A blank or null website clears it.
 */
export function validateBrandUpdate(input: unknown): UpdateBrandFields {
  const payload = requireRecord(input);
  rejectUnknownFields(payload, BRAND_UPDATE_FIELDS);

  const fields: UpdateBrandFields = {};
  if ('name' in payload) {
    fields.name = requireText(payload.name, 'name', BRAND_NAME_RULE);
  }
  if ('description' in payload) {
    fields.description = requireText(payload.description, 'description', BRAND_DESCRIPTION_RULE);
  }
  if ('website' in payload) {
    fields.website = isBlank(payload.website) ? null : validateWebsite(payload.website);
  }

  if (Object.keys(fields).length === 0) {
    throw new ValidationError('No valid fields to update');
  }
  return fields;
}
