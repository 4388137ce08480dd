/**
 * Shared entity types
 */

/**
 * Fields every catalog entity carries
 */
export interface Timestamps {
  /** Creation timestamp (ISO8601, UTC), fixed at creation */
  created_at: string;
  /** Last mutation timestamp (ISO8601, UTC) */
  updated_at: string;
}

/**
 * One page of a listing
 */
export interface Page<T> {
  items: T[];
  /** Opaque cursor for the next page, null on the last page */
  nextContinuationToken: string | null;
}

/**
 * Listing options accepted by every repository
 */
export interface ListOptions {
  limit?: number;
  continuationToken?: string | null;
}
