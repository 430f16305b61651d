/**
 * Domain error types for the Security Groups module.
 */

import type { AppError } from '@/common/types/errors.js';
import type { CacheError } from '@/infra/cache/ports.js';

/**
 * A cache key that does not follow the key schema.
 */
export interface InvalidKeyError extends AppError {
  readonly type: 'InvalidKey';
  readonly key: string;
}

/**
 * Cached attributes that cannot be reconstructed into a security group.
 */
export interface MalformedEntryError extends AppError {
  readonly type: 'MalformedEntry';
  readonly key: string;
  readonly details: readonly string[];
}

/**
 * A single-result lookup matched several VPC-scoped groups.
 */
export interface AmbiguousSecurityGroupError extends AppError {
  readonly type: 'AmbiguousSecurityGroup';
  readonly candidates: readonly string[];
}

/** Errors confined to one cached entry; the entry is skipped. */
export type EntryError = InvalidKeyError | MalformedEntryError;

/** Errors returned to callers of the query API. */
export type SecurityGroupError = CacheError | AmbiguousSecurityGroupError;

export const isEntryError = (error: EntryError | CacheError): error is EntryError =>
  error.type === 'InvalidKey' || error.type === 'MalformedEntry';

export const createMalformedEntryError = (
  key: string,
  message: string,
  details: readonly string[] = []
): MalformedEntryError => ({
  type: 'MalformedEntry',
  message,
  key,
  details,
});
