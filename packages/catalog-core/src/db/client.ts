/**
 * DynamoDB Client
 *
 * Clients are built from an explicit configuration. The process bootstrap
 * owns the instance and reuses it across invocations.
 */

import type { DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { CatalogConfig } from '../config/config';

// Per-call limits for the store; the core itself never retries
export const CONNECTION_TIMEOUT_MS = 3_000;
export const REQUEST_TIMEOUT_MS = 5_000;

/**
 * DynamoDB client configuration
 */
export function createClientConfig(config: CatalogConfig): DynamoDBClientConfig {
  const base: DynamoDBClientConfig = {
    region: config.region,
    maxAttempts: config.maxAttempts,
    requestHandler: {
      connectionTimeout: CONNECTION_TIMEOUT_MS,
      requestTimeout: REQUEST_TIMEOUT_MS,
    },
  };

  if (config.endpoint) {
    // DynamoDB Local accepts any credentials
    return {
      ...base,
      endpoint: config.endpoint,
      credentials: {
        accessKeyId: 'local',
        secretAccessKey: 'local',
      },
    };
  }
  return base;
}

export function createDynamoDBClient(config: CatalogConfig): DynamoDBClient {
  return new DynamoDBClient(createClientConfig(config));
}

/**
 * DynamoDB Document client. Numbers are read wrapped so that decimals survive
 * until `fromStoredNumbers` converts them.
 */
export function createDocClient(client: DynamoDBClient): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
      convertEmptyValues: false,
    },
    unmarshallOptions: {
      wrapNumbers: true,
    },
  });
}
