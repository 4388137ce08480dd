import { ValidationError } from '../errors/catalog-error';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Validate UUID format (any version, case-insensitive)
 */
export function isValidUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Length and charset rules for a free-text field
 */
export interface TextRule {
  /** Human-readable name used in messages, e.g. "Brand name" */
  label: string;
  min: number;
  max: number;
  pattern?: RegExp;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Require a JSON object payload
 */
export function requireRecord(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return value;
}

/**
 * Reject keys outside the allow-list
 */
export function rejectUnknownFields(payload: Record<string, unknown>, allowed: readonly string[]): void {
  const invalid = Object.keys(payload).filter((key) => !allowed.includes(key));
  if (invalid.length > 0) {
    throw new ValidationError(`Invalid fields: ${invalid.join(', ')}`);
  }
}

/**
 * Presence, trim, length and charset checks, in that order.
 * Returns the trimmed value.
 */
export function requireText(value: unknown, field: string, rule: TextRule): string {
  if (value === undefined || value === null) {
    throw new ValidationError(`${rule.label} is required`, field);
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${rule.label} must be a string`, field);
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${rule.label} cannot be empty or whitespace`, field);
  }
  if (trimmed.length < rule.min) {
    throw new ValidationError(`${rule.label} must be at least ${rule.min} characters long`, field);
  }
  if (trimmed.length > rule.max) {
    throw new ValidationError(`${rule.label} cannot exceed ${rule.max} characters`, field);
  }
  if (rule.pattern && !rule.pattern.test(trimmed)) {
    throw new ValidationError(`${rule.label} contains invalid characters`, field);
  }

  return trimmed;
}

/**
 * Blank strings count as absent for optional text
 */
export function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/**
 * Validate a reference to another entity
 */
export function requireUuid(value: unknown, field: string, label: string): string {
  if (value === undefined || value === null) {
    throw new ValidationError(`${label} is required`, field);
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${label} must be a string`, field);
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${label} cannot be empty or whitespace`, field);
  }
  if (!isValidUuid(trimmed)) {
    throw new ValidationError(`${label} must be a valid UUID`, field);
  }
  return trimmed;
}
