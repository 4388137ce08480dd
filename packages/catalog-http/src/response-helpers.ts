/**
 * Response helpers for Lambda API Gateway responses
 */

import type { APIGatewayProxyResult } from 'aws-lambda';

export const CORS_ALLOW_METHODS = 'GET, POST, PUT, PATCH, DELETE, OPTIONS';
export const CORS_ALLOW_HEADERS =
  'Content-Type, Authorization, X-Amz-Date, X-Api-Key, X-Amz-Security-Token';

const DEFAULT_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': CORS_ALLOW_METHODS,
  'Access-Control-Allow-Headers': CORS_ALLOW_HEADERS,
};

/**
 * Success envelope
 */
export interface SuccessBody<T> {
  message: string;
  data?: T;
}

/**
 * Error envelope
 */
export interface ErrorBody {
  error: string;
  message: string;
  requestId?: string;
}

/**
 * Create a JSON response
 */
export function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { ...DEFAULT_HEADERS },
    body: JSON.stringify(body),
  };
}

/**
 * Create a 200 OK response
 */
export function ok<T>(data: T, message = 'Success'): APIGatewayProxyResult {
  const body: SuccessBody<T> = { message, data };
  return jsonResponse(200, body);
}

/**
 * 200 OK carrying only a message
 */
export function okMessage(message: string): APIGatewayProxyResult {
  const body: SuccessBody<never> = { message };
  return jsonResponse(200, body);
}

/**
 * Create a 201 Created response
 */
export function created<T>(data: T, message = 'Created successfully'): APIGatewayProxyResult {
  const body: SuccessBody<T> = { message, data };
  return jsonResponse(201, body);
}

function errorResponse(
  statusCode: number,
  error: string,
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  const body: ErrorBody = { error, message, ...(requestId ? { requestId } : {}) };
  return jsonResponse(statusCode, body);
}

/**
 * Create a 400 Bad Request response
 */
export function badRequest(message = 'Bad request'): APIGatewayProxyResult {
  return errorResponse(400, 'Bad Request', message);
}

/**
 * Create a 404 Not Found response
 */
export function notFound(message = 'Not found'): APIGatewayProxyResult {
  return errorResponse(404, 'Not Found', message);
}

/**
 * Create a 405 Method Not Allowed response
 */
export function methodNotAllowed(method: string): APIGatewayProxyResult {
  return errorResponse(405, 'Method Not Allowed', `Method ${method} not allowed`);
}

/**
 * Create a 409 Conflict response
 */
export function conflict(message = 'Conflict'): APIGatewayProxyResult {
  return errorResponse(409, 'Conflict', message);
}

/**
 * Create a 500 Internal Server Error response
 */
export function internalError(
  message = 'An unexpected error occurred',
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(500, 'Internal Server Error', message, requestId);
}

/**
 * Empty 200 answering a CORS preflight
 */
export function preflight(): APIGatewayProxyResult {
  return {
    statusCode: 200,
    headers: { ...DEFAULT_HEADERS },
    body: '',
  };
}

/**
 * Pick the `Access-Control-Allow-Origin` value for a request.
 * A `*` entry allows any origin; otherwise the request origin must be listed.
 */
export function resolveAllowedOrigin(
  allowed: readonly string[],
  requestOrigin: string | undefined
): string | null {
  if (allowed.includes('*')) {
    return '*';
  }
  if (requestOrigin && allowed.includes(requestOrigin)) {
    return requestOrigin;
  }
  return allowed[0] ?? null;
}

/**
 * Apply the configured origins to a response
 */
export function withCors(
  response: APIGatewayProxyResult,
  allowed: readonly string[],
  requestOrigin: string | undefined
): APIGatewayProxyResult {
  const origin = resolveAllowedOrigin(allowed, requestOrigin);
  const headers = { ...response.headers };

  if (origin === null) {
    delete headers['Access-Control-Allow-Origin'];
  } else {
    headers['Access-Control-Allow-Origin'] = origin;
    if (origin !== '*') {
      headers.Vary = 'Origin';
    }
  }

  return { ...response, headers };
}
