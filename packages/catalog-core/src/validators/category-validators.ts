import { CATEGORY_UPDATE_FIELDS } from '../db/items';
import { ValidationError } from '../errors/catalog-error';
import type { CreateCategoryInput, UpdateCategoryFields } from '../types/category';
import { rejectUnknownFields, requireRecord, requireText, type TextRule } from './common';

export const CATEGORY_NAME_RULE: TextRule = {
  label: 'Category name',
  min: 2,
  max: 100,
  pattern: /^[a-zA-Z0-9\s\-_&.]+$/,
};

export const CATEGORY_DESCRIPTION_RULE: TextRule = {
  label: 'Category description',
  min: 10,
  max: 500,
};

export function validateCreateCategory(input: unknown): CreateCategoryInput {
  const payload = requireRecord(input);
  return {
    name: requireText(payload.name, 'name', CATEGORY_NAME_RULE),
    description: requireText(payload.description, 'description', CATEGORY_DESCRIPTION_RULE),
  };
}

export function validateCategoryUpdate(input: unknown): UpdateCategoryFields {
  const payload = requireRecord(input);
  rejectUnknownFields(payload, CATEGORY_UPDATE_FIELDS);

  const fields: UpdateCategoryFields = {};
  if ('name' in payload) {
    fields.name = requireText(payload.name, 'name', CATEGORY_NAME_RULE);
  }
  if ('description' in payload) {
    fields.description = requireText(payload.description, 'description', CATEGORY_DESCRIPTION_RULE);
  }

  if (Object.keys(fields).length === 0) {
    throw new ValidationError('No valid fields to update');
  }
  return fields;
}
