import { randomUUID } from 'node:crypto';
import type { Page } from '../types/common';
import { DEFAULT_PAGE_SIZE } from './constants';
import type { CatalogItem } from './store';

/**
 * Options shared by the entity repositories
 */
export interface RepositoryOptions {
  /** Mark items deleted instead of removing them */
  softDelete?: boolean;
  /** Source of timestamps */
  clock?: () => Date;
  /** Source of entity ids */
  generateId?: () => string;
}

export interface ResolvedRepositoryOptions {
  softDelete: boolean;
  clock: () => Date;
  generateId: () => string;
}

export function resolveRepositoryOptions(options: RepositoryOptions = {}): ResolvedRepositoryOptions {
  return {
    softDelete: options.softDelete ?? false,
    clock: options.clock ?? (() => new Date()),
    generateId: options.generateId ?? randomUUID,
  };
}

export function pageLimit(limit: number | undefined): number {
  return limit ?? DEFAULT_PAGE_SIZE;
}

export function mapPage<T>(page: Page<CatalogItem>, convert: (item: CatalogItem) => T): Page<T> {
  return {
    items: page.items.map(convert),
    nextContinuationToken: page.nextContinuationToken,
  };
}
