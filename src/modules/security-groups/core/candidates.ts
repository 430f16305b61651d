import { err, ok, type Result } from 'neverthrow';

import { matchesCriteria, type KeySchema } from './keys.js';
import { SECURITY_GROUP_TYPE, type KeyCriteria, type ResourceKey } from './types.js';

import { createMalformedEntryError } from './errors.js';

import type { AmbiguousSecurityGroupError, InvalidKeyError, MalformedEntryError } from './errors.js';
import type { CacheEntry, UnreadableEntry } from '@/infra/cache/ports.js';

export interface Candidate {
  entry: CacheEntry;
  key: ResourceKey;
}

/**
 * Decode entry keys and keep the ones that satisfy the criteria, ordered by
 * cache key. Keys that cannot be decoded go to `onInvalidKey`.
 */
export const selectCandidates = (
  keys: KeySchema,
  entries: readonly CacheEntry[],
  criteria: KeyCriteria,
  onInvalidKey: (error: InvalidKeyError) => void
): Candidate[] => {
  const candidates: Candidate[] = [];

  for (const entry of entries) {
    const parsed = keys.parse(entry.key);
    if (parsed.isErr()) {
      onInvalidKey(parsed.error);
      continue;
    }
    if (parsed.value.type !== SECURITY_GROUP_TYPE) {
      onInvalidKey({
        type: 'InvalidKey',
        message: `Unexpected resource type '${parsed.value.type}'`,
        key: entry.key,
      });
      continue;
    }
    if (matchesCriteria(parsed.value, criteria)) {
      candidates.push({ entry, key: parsed.value });
    }
  }

  return candidates.sort((a, b) => (a.entry.key < b.entry.key ? -1 : a.entry.key > b.entry.key ? 1 : 0));
};

/**
 * Entries whose stored value could not be decoded, as malformed-entry errors.
 * Security group keys outside the criteria are left out, the same as for
 * readable entries.
 */
export const unreadableEntryErrors = (
  keys: KeySchema,
  unreadable: readonly UnreadableEntry[],
  criteria: KeyCriteria
): MalformedEntryError[] =>
  unreadable.flatMap(({ key, error }) => {
    const parsed = keys.parse(key);
    if (
      parsed.isOk() &&
      parsed.value.type === SECURITY_GROUP_TYPE &&
      !matchesCriteria(parsed.value, criteria)
    ) {
      return [];
    }
    return [createMalformedEntryError(key, 'Cached value cannot be decoded', [error.message])];
  });

/**
 * Pick the single group a `get`/`getById` call refers to.
 *
 * - With an explicit vpcId, candidates are already limited to that VPC.
 * - Without one, a group outside any VPC wins; otherwise the only VPC-scoped
 *   match is returned.
 * - More than one remaining candidate is an ambiguity error.
 */
export const chooseCandidate = (
  candidates: readonly Candidate[],
  vpcId: string | undefined
): Result<Candidate | undefined, AmbiguousSecurityGroupError> => {
  let pool = candidates;
  if (vpcId === undefined) {
    const outsideVpc = candidates.filter((candidate) => candidate.key.vpcId === undefined);
    if (outsideVpc.length > 0) {
      pool = outsideVpc;
    }
  }

  if (pool.length > 1) {
    return err({
      type: 'AmbiguousSecurityGroup',
      message: `${String(pool.length)} security groups match; specify a vpcId`,
      candidates: pool.map((candidate) => candidate.entry.key),
    });
  }

  return ok(pool[0]);
};
