import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../db/constants';
import type { CatalogError } from '../errors/catalog-error';
import { attempt, type Result } from '../errors/result';
import type { ListOptions } from '../types/common';
import type { Logger } from '../utils/logger';

/**
 * Clamp a requested page size into 1..MAX_PAGE_SIZE, defaulting when absent
 */
export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return DEFAULT_PAGE_SIZE;
  }
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_PAGE_SIZE);
}

export function listOptions(options: ListOptions = {}): ListOptions {
  return {
    limit: clampLimit(options.limit),
    continuationToken: options.continuationToken ?? null,
  };
}

function logFailure(logger: Logger, operation: string, error: CatalogError): void {
  const attributes = { operation, code: error.code, error: error.message };
  switch (error.code) {
    case 'VALIDATION_ERROR':
    case 'DUPLICATE':
      logger.warn(`${operation} rejected`, attributes);
      break;
    case 'NOT_FOUND':
      logger.info(`${operation} target not found`, attributes);
      break;
    case 'DATABASE_ERROR':
      logger.error(`${operation} failed`, { ...attributes, cause: error.cause });
      break;
  }
}

/**
 * Run a service operation, returning its outcome as a Result and logging failures
 */
export async function runOperation<T>(
  logger: Logger,
  operation: string,
  run: () => Promise<T>
): Promise<Result<T>> {
  const result = await attempt(operation, run);
  if (!result.success) {
    logFailure(logger, operation, result.error);
  }
  return result;
}
