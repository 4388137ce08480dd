/**
 * Catalog error codes
 */
export type CatalogErrorCode = 'VALIDATION_ERROR' | 'DUPLICATE' | 'NOT_FOUND' | 'DATABASE_ERROR';

/**
 * Base class for every error the catalog core surfaces to its callers
 */
export abstract class CatalogError extends Error {
  abstract readonly code: CatalogErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad input: a field is missing, malformed or out of range
 */
export class ValidationError extends CatalogError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
  }
}

/**
 * Name uniqueness or conditional-write conflict
 */
export class DuplicateError extends CatalogError {
  readonly code = 'DUPLICATE';
}

/**
 * Referenced or targeted entity is absent
 */
export class NotFoundError extends CatalogError {
  readonly code = 'NOT_FOUND';
}

/**
 * Store failure that is not otherwise classified
 */
export class DatabaseError extends CatalogError {
  readonly code = 'DATABASE_ERROR';

  constructor(
    message: string,
    public readonly operation?: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}
