/**
 * Numeric normalization across the store boundary.
 *
 * Writes send every number as an exact decimal built from its shortest
 * decimal string, so 19.99 is stored as `19.99` and never as a binary
 * approximation. Reads run with `wrapNumbers` and turn the decimals back into
 * JS numbers; integral decimals come back as integers.
 */

import { NumberValueImpl } from '@aws-sdk/util-dynamodb';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Wrapped decimal produced by `wrapNumbers`. Matched by shape as well, in case
 * the document client resolves its own copy of util-dynamodb.
 */
function isNumberValue(value: unknown): value is { value: string } {
  if (value instanceof NumberValueImpl) {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    value.constructor?.name === 'NumberValue' &&
    'value' in value &&
    typeof value.value === 'string'
  );
}

/**
 * Convert outgoing numbers to exact decimals
 */
export function toStoredNumbers(value: unknown): unknown {
  if (typeof value === 'number') {
    return NumberValueImpl.from(String(value));
  }
  if (Array.isArray(value)) {
    return value.map(toStoredNumbers);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, toStoredNumbers(entry)])
    );
  }
  return value;
}

/**
 * Convert wrapped decimals from a read back to JS numbers
 */
export function fromStoredNumbers(value: unknown): unknown {
  if (isNumberValue(value)) {
    return Number(value.value);
  }
  if (Array.isArray(value)) {
    return value.map(fromStoredNumbers);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, fromStoredNumbers(entry)])
    );
  }
  return value;
}

/**
 * Normalize one attribute map for writing
 */
export function toStoredItem(item: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(item)
      .filter(([, entry]) => entry !== undefined)
      .map(([key, entry]) => [key, toStoredNumbers(entry)])
  );
}

/**
 * Normalize one attribute map after reading
 */
export function fromStoredItem(item: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(item).map(([key, entry]) => [key, fromStoredNumbers(entry)])
  );
}
