/**
 * Cache store port interfaces using Result pattern for explicit error handling.
 */

import type { InfraError } from '@/common/types/errors.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheError = InfraError;

export const CacheError = {
  connection: (message: string, cause?: unknown): CacheError => ({
    type: 'ConnectionError',
    message,
    retryable: true,
    cause,
  }),
  serialization: (message: string, cause?: unknown): CacheError => ({
    type: 'SerializationError',
    message,
    retryable: false,
    cause,
  }),
  timeout: (message: string, cause?: unknown): CacheError => ({
    type: 'TimeoutError',
    message,
    retryable: true,
    cause,
  }),
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Entries
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One cached resource inside a namespace.
 * Entries handed out by a store must be treated as read-only.
 */
export interface CacheEntry {
  readonly key: string;
  readonly attributes: Readonly<Record<string, unknown>>;
  /** Related keys grouped by the related namespace. */
  readonly relationships: Readonly<Record<string, readonly string[]>>;
}

/**
 * A member key whose stored value could not be decoded.
 */
export interface UnreadableEntry {
  readonly key: string;
  readonly error: CacheError;
}

/**
 * Entries read from a namespace. Values that fail to decode are reported
 * in `unreadable` and do not fail the read.
 */
export interface CacheReadResult {
  entries: CacheEntry[];
  unreadable: UnreadableEntry[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Cache Statistics
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// CacheStorePort
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Namespaced key/attribute store.
 *
 * Writes replace whole entries, so a reader observes either the previous or
 * the new entry for a key. Unknown namespaces behave as empty.
 * Result ordering of `getAll` and `filter` is unspecified.
 */
export interface CacheStorePort {
  /**
   * Insert or replace a single entry.
   */
  merge(namespace: string, entry: CacheEntry): Promise<Result<void, CacheError>>;

  /**
   * Insert or replace several entries in one write.
   */
  mergeAll(namespace: string, entries: readonly CacheEntry[]): Promise<Result<void, CacheError>>;

  /**
   * Retrieve an entry by key.
   * @returns Ok(entry) if found, Ok(undefined) if not found, Err on failure
   */
  get(namespace: string, key: string): Promise<Result<CacheEntry | undefined, CacheError>>;

  /**
   * Every entry of a namespace.
   */
  getAll(namespace: string): Promise<Result<CacheReadResult, CacheError>>;

  /**
   * Entries whose key matches a glob pattern (`*`, `?`, backslash escapes).
   */
  filter(namespace: string, pattern: string): Promise<Result<CacheReadResult, CacheError>>;

  /**
   * Get cache statistics for monitoring.
   */
  stats(): Promise<CacheStats>;
}
