import { type CatalogError, DatabaseError, isCatalogError } from './catalog-error';

/**
 * Result type for service operations
 */
export type Result<T, E = CatalogError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E = CatalogError>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Runs an operation and folds catalog errors into a failed result.
 * Anything else is reported as a DatabaseError.
 */
export async function attempt<T>(operation: string, run: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await run());
  } catch (error) {
    if (isCatalogError(error)) {
      return err(error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(new DatabaseError(`Unexpected failure in ${operation}: ${message}`, operation, error));
  }
}
