/**
 * API Gateway handler wrapper
 *
 * Bootstraps the runtime, logs the request, answers CORS preflights, maps
 * thrown catalog errors to responses and applies the configured origins.
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { type Catalog, createLogger, isCatalogError, type Logger } from '@catalog/catalog-core';
import { requestOrigin } from './request';
import { internalError, preflight, withCors } from './response-helpers';
import { errorToResponse } from './result-response';
import { type CatalogRuntime, getRuntime } from './runtime';

/**
 * What a route receives for one invocation
 */
export interface ApiRequest {
  event: APIGatewayProxyEvent;
  catalog: Catalog;
  logger: Logger;
  requestId: string;
}

export type ApiRoute = (request: ApiRequest) => Promise<APIGatewayProxyResult>;

export type ApiHandler = (
  event: APIGatewayProxyEvent,
  context: Context
) => Promise<APIGatewayProxyResult>;

function bootstrap(serviceName: string): CatalogRuntime | Error {
  try {
    return getRuntime(serviceName);
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

export function createApiHandler(serviceName: string, route: ApiRoute): ApiHandler {
  return async (event, context) => {
    const runtime = bootstrap(serviceName);
    if (runtime instanceof Error) {
      createLogger(serviceName).error('Failed to initialize catalog runtime', { error: runtime });
      return internalError('Service is not configured', context.awsRequestId);
    }

    const { config, logger, catalog } = runtime;
    logger.addContext(context);
    logger.info('Request', {
      method: event.httpMethod,
      path: event.path,
      resource: event.resource,
    });

    let response: APIGatewayProxyResult;
    if (event.httpMethod === 'OPTIONS') {
      response = preflight();
    } else {
      try {
        response = await route({ event, catalog, logger, requestId: context.awsRequestId });
      } catch (error) {
        if (isCatalogError(error) && error.code !== 'DATABASE_ERROR') {
          logger.warn('Request rejected', { code: error.code, error: error.message });
          response = errorToResponse(error);
        } else {
          logger.error('Unhandled error', { error });
          response = internalError('An unexpected error occurred', context.awsRequestId);
        }
      }
    }

    logger.info('Response', { statusCode: response.statusCode });
    return withCors(response, config.corsOrigins, requestOrigin(event));
  };
}
