/**
 * Test helpers for handlers built on createApiHandler
 */

import type { APIGatewayProxyEvent, Context } from 'aws-lambda';
import { type CatalogConfig, loadConfig } from '@catalog/catalog-core';
import { createTestCatalog, type TestCatalog, type TestCatalogOptions } from '@catalog/catalog-core/testing';
import { setRuntime } from './runtime';

export const createMockContext = (functionName = 'catalog-api'): Context => ({
  callbackWaitsForEmptyEventLoop: true,
  functionName,
  functionVersion: '1',
  invokedFunctionArn: `arn:aws:lambda:us-east-1:123456789012:function:${functionName}`,
  memoryLimitInMB: '512',
  awsRequestId: 'test-request-id',
  logGroupName: `/aws/lambda/${functionName}`,
  logStreamName: '2024/01/01/[$LATEST]test',
  getRemainingTimeInMillis: () => 30000,
  done: () => {},
  fail: () => {},
  succeed: () => {},
});

export interface MockEventInit {
  httpMethod?: string;
  resource?: string;
  path?: string;
  pathParameters?: Record<string, string>;
  queryStringParameters?: Record<string, string>;
  headers?: Record<string, string>;
  body?: unknown;
}

/**
 * API Gateway REST proxy event. A non-string body is sent as JSON.
 */
export function createMockEvent(init: MockEventInit = {}): APIGatewayProxyEvent {
  const resource = init.resource ?? '/';
  const body = init.body === undefined ? null : typeof init.body === 'string' ? init.body : JSON.stringify(init.body);

  return {
    httpMethod: init.httpMethod ?? 'GET',
    resource,
    path: init.path ?? resource,
    pathParameters: init.pathParameters ?? null,
    queryStringParameters: init.queryStringParameters ?? null,
    headers: init.headers ?? {},
    body,
    isBase64Encoded: false,
    multiValueHeaders: {},
    multiValueQueryStringParameters: null,
    stageVariables: null,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      authorizer: null,
      protocol: 'HTTP/1.1',
      httpMethod: init.httpMethod ?? 'GET',
      identity: {
        accessKey: null,
        accountId: null,
        apiKey: null,
        apiKeyId: null,
        caller: null,
        clientCert: null,
        cognitoAuthenticationProvider: null,
        cognitoAuthenticationType: null,
        cognitoIdentityId: null,
        cognitoIdentityPoolId: null,
        principalOrgId: null,
        sourceIp: '127.0.0.1',
        user: null,
        userAgent: 'vitest',
        userArn: null,
      },
      path: resource,
      stage: 'test',
      requestId: 'test-request-id',
      requestTimeEpoch: 1704067200000,
      resourceId: 'test-resource',
      resourcePath: resource,
    },
  };
}

export interface TestRuntimeOptions extends TestCatalogOptions {
  /** Environment overrides, e.g. CORS_ORIGINS */
  env?: NodeJS.ProcessEnv;
}

/**
 * Install a runtime over an in-memory catalog and return the catalog
 */
export function useTestRuntime(options: TestRuntimeOptions = {}): TestCatalog & { config: CatalogConfig } {
  const config = loadConfig({ LOG_LEVEL: 'SILENT', ...options.env });
  const catalog = createTestCatalog({ ...options, softDelete: options.softDelete ?? config.softDelete });
  setRuntime({ config, logger: catalog.logger, catalog });
  return { ...catalog, config };
}
