/**
 * Request parsing for API Gateway proxy events
 */

import type { APIGatewayProxyEvent } from 'aws-lambda';
import { type ListOptions, ValidationError } from '@catalog/catalog-core';

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Parse the JSON request body. An absent or empty body reads as `{}`.
 * @throws ValidationError when the body is not valid JSON
 */
export function parseJsonBody(event: APIGatewayProxyEvent): unknown {
  if (!event.body) {
    return {};
  }

  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf-8') : event.body;
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

/**
 * Trimmed path parameter, null when absent or blank
 */
export function pathParameter(event: APIGatewayProxyEvent, name: string): string | null {
  const value = event.pathParameters?.[name]?.trim();
  return value ? value : null;
}

export function queryParameter(event: APIGatewayProxyEvent, name: string): string | null {
  const value = event.queryStringParameters?.[name];
  return value === undefined || value === '' ? null : value;
}

/**
 * `limit` and `last_key` query parameters. Clamping is left to the services.
 * @throws ValidationError when `limit` is not an integer
 */
export function parseListOptions(event: APIGatewayProxyEvent): ListOptions {
  const limit = queryParameter(event, 'limit');
  const lastKey = queryParameter(event, 'last_key');

  if (limit !== null && !INTEGER_PATTERN.test(limit.trim())) {
    throw new ValidationError('limit must be an integer', 'limit');
  }

  return {
    ...(limit !== null ? { limit: Number.parseInt(limit, 10) } : {}),
    continuationToken: lastKey,
  };
}

export function requestOrigin(event: APIGatewayProxyEvent): string | undefined {
  return event.headers.origin ?? event.headers.Origin;
}
