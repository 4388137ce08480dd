/**
 * Mapping of service results to HTTP responses
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import type { CatalogError, Result } from '@catalog/catalog-core';
import { badRequest, conflict, internalError, notFound } from './response-helpers';

/**
 * Status for each catalog error code. Database failures never leak their message.
 */
export function errorToResponse(error: CatalogError, requestId?: string): APIGatewayProxyResult {
  switch (error.code) {
    case 'VALIDATION_ERROR':
      return badRequest(error.message);
    case 'DUPLICATE':
      return conflict(error.message);
    case 'NOT_FOUND':
      return notFound(error.message);
    case 'DATABASE_ERROR':
      return internalError('An unexpected error occurred', requestId);
  }
}

/**
 * Turn a successful result into a response with `onSuccess`, a failed one by error code
 */
export function resultToResponse<T>(
  result: Result<T>,
  onSuccess: (data: T) => APIGatewayProxyResult,
  requestId?: string
): APIGatewayProxyResult {
  return result.success ? onSuccess(result.data) : errorToResponse(result.error, requestId);
}
