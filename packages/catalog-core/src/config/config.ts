/**
 * Runtime configuration
 *
 * Read once from environment variables by the process bootstrap and passed
 * down explicitly.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'CRITICAL', 'SILENT'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = z
  .enum(['true', 'false', 'TRUE', 'FALSE', 'True', 'False', '1', '0'])
  .transform((value) => value.toLowerCase() === 'true' || value === '1');

const envSchema = z.object({
  DYNAMODB_TABLE: z.string().min(1).default('products_catalog'),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  DYNAMODB_ENDPOINT: z.string().url().optional(),
  DYNAMODB_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(LOG_LEVELS))
    .default('INFO'),
  ENABLE_SOFT_DELETE: booleanFlag.default('false'),
  CORS_ORIGINS: z.string().min(1).default('*'),
});

export interface CatalogConfig {
  readonly tableName: string;
  readonly region: string;
  /** DynamoDB Local endpoint; unset in deployed environments */
  readonly endpoint?: string;
  readonly maxAttempts: number;
  readonly logLevel: LogLevel;
  readonly softDelete: boolean;
  readonly corsOrigins: readonly string[];
}

/**
 * Thrown when the environment cannot be turned into a configuration
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const result = envSchema.safeParse({
    DYNAMODB_TABLE: env.DYNAMODB_TABLE || undefined,
    AWS_REGION: env.AWS_REGION || undefined,
    DYNAMODB_ENDPOINT: env.DYNAMODB_ENDPOINT || undefined,
    DYNAMODB_MAX_ATTEMPTS: env.DYNAMODB_MAX_ATTEMPTS || undefined,
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    ENABLE_SOFT_DELETE: env.ENABLE_SOFT_DELETE || undefined,
    CORS_ORIGINS: env.CORS_ORIGINS || undefined,
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    tableName: parsed.DYNAMODB_TABLE,
    region: parsed.AWS_REGION,
    ...(parsed.DYNAMODB_ENDPOINT ? { endpoint: parsed.DYNAMODB_ENDPOINT } : {}),
    maxAttempts: parsed.DYNAMODB_MAX_ATTEMPTS,
    logLevel: parsed.LOG_LEVEL,
    softDelete: parsed.ENABLE_SOFT_DELETE,
    corsOrigins: parsed.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}
