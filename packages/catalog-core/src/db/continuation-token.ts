/**
 * Continuation tokens
 *
 * The token handed to callers is the store's LastEvaluatedKey, serialized as
 * base64url JSON. Callers treat it as opaque.
 */

import { ValidationError } from '../errors/catalog-error';

export type StartKey = Record<string, string>;

export function encodeContinuationToken(lastEvaluatedKey: Record<string, unknown> | undefined): string | null {
  if (!lastEvaluatedKey || Object.keys(lastEvaluatedKey).length === 0) {
    return null;
  }
  return Buffer.from(JSON.stringify(lastEvaluatedKey)).toString('base64url');
}

/**
 * @throws ValidationError when the token is not one this layer issued
 */
export function decodeContinuationToken(token: string | null | undefined): StartKey | undefined {
  if (!token) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(token, 'base64url').toString('utf-8'));
  } catch {
    throw new ValidationError('Invalid continuation token', 'last_key');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('Invalid continuation token', 'last_key');
  }

  const startKey: StartKey = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw new ValidationError('Invalid continuation token', 'last_key');
    }
    startKey[key] = value;
  }
  return startKey;
}
