/**
 * Port interfaces for the Security Groups module.
 */

import type { EntryError } from './errors.js';
import type { KeyCriteria } from './types.js';
import type { CacheError, CacheReadResult } from '@/infra/cache/ports.js';
import type { Result } from 'neverthrow';

/**
 * Read access to cached security group entries.
 */
export interface SecurityGroupRepository {
  /**
   * Entries whose key agrees with the criteria. Results may include keys
   * that only match the scan pattern loosely; callers narrow them. Keys
   * whose stored value cannot be decoded come back as `unreadable`.
   */
  findEntries(criteria: KeyCriteria): Promise<Result<CacheReadResult, CacheError>>;
}

/**
 * An entry left out of a query result.
 */
export interface ReconstructionFailure {
  key: string;
  error: EntryError;
}

/**
 * Receives skipped entries, e.g. for metrics.
 */
export type ReconstructionFailureReporter = (failure: ReconstructionFailure) => void;
