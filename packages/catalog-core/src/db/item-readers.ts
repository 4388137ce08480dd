/**
 * Typed readers for raw items coming back from the store
 */

import { DatabaseError } from '../errors/catalog-error';
import type { CatalogItem } from './store';

function malformed(item: CatalogItem, field: string, expected: string): DatabaseError {
  return new DatabaseError(
    `Malformed item ${String(item.PK)}: ${field} is not ${expected}`,
    'read'
  );
}

export function readString(item: CatalogItem, field: string): string {
  const value = item[field];
  if (typeof value !== 'string') {
    throw malformed(item, field, 'a string');
  }
  return value;
}

export function readNumber(item: CatalogItem, field: string): number {
  const value = item[field];
  if (typeof value !== 'number') {
    throw malformed(item, field, 'a number');
  }
  return value;
}

export function readOptionalString(item: CatalogItem, field: string): string | undefined {
  const value = item[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw malformed(item, field, 'a string');
  }
  return value;
}

export function readOptionalStringList(item: CatalogItem, field: string): string[] | undefined {
  const value = item[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    throw malformed(item, field, 'a list of strings');
  }
  return value;
}
