/**
 * @catalog/catalog-http
 *
 * API Gateway plumbing shared by the catalog functions
 * - Handler wrapper with CORS preflight and error mapping
 * - Response helpers and request parsing
 * - Lazily built process-wide runtime
 */

export { type ApiHandler, type ApiRequest, type ApiRoute, createApiHandler } from './api-handler';
export {
  pathParameter,
  parseJsonBody,
  parseListOptions,
  queryParameter,
  requestOrigin,
} from './request';
export {
  badRequest,
  conflict,
  CORS_ALLOW_HEADERS,
  CORS_ALLOW_METHODS,
  created,
  type ErrorBody,
  internalError,
  jsonResponse,
  methodNotAllowed,
  notFound,
  ok,
  okMessage,
  preflight,
  resolveAllowedOrigin,
  type SuccessBody,
  withCors,
} from './response-helpers';
export { errorToResponse, resultToResponse } from './result-response';
export {
  type CatalogRuntime,
  createRuntime,
  getRuntime,
  resetRuntime,
  setRuntime,
} from './runtime';
