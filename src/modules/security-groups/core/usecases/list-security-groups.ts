/**
 * Use case: list cached security groups matching key criteria.
 */

import { err, ok, type Result } from 'neverthrow';

import { selectCandidates, unreadableEntryErrors } from '../candidates.js';
import { isEntryError } from '../errors.js';
import { buildSecurityGroup, type BuildSecurityGroupDeps } from './build-security-group.js';
import { makeReferenceLookup } from './reconstruct-inbound-rules.js';
import { reportEntryFailure, type ReportFailureDeps } from './report-failure.js';

import type { KeyCriteria, SecurityGroup } from '../types.js';
import type { CacheError } from '@/infra/cache/ports.js';

/** Groups built concurrently. */
export const BUILD_CONCURRENCY = 8;

export type ListSecurityGroupsDeps = BuildSecurityGroupDeps & ReportFailureDeps;

export interface ListSecurityGroupsInput {
  criteria: KeyCriteria;
  /** When false, groups are returned with empty rule lists. */
  includeRules: boolean;
}

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Stable output order: account, region, name, id, vpcId.
 */
export const compareSecurityGroups = (a: SecurityGroup, b: SecurityGroup): number =>
  compareText(a.accountName, b.accountName) ||
  compareText(a.region, b.region) ||
  compareText(a.name, b.name) ||
  compareText(a.id, b.id) ||
  compareText(a.vpcId ?? '', b.vpcId ?? '');

/**
 * List security groups.
 *
 * Entries that cannot be decoded or reconstructed are reported and left out;
 * only a cache failure fails the whole listing.
 */
export const listSecurityGroups = async (
  deps: ListSecurityGroupsDeps,
  input: ListSecurityGroupsInput
): Promise<Result<SecurityGroup[], CacheError>> => {
  const entries = await deps.repo.findEntries(input.criteria);
  if (entries.isErr()) {
    return err(entries.error);
  }

  for (const failure of unreadableEntryErrors(deps.keys, entries.value.unreadable, input.criteria)) {
    reportEntryFailure(deps, failure);
  }

  const candidates = selectCandidates(deps.keys, entries.value.entries, input.criteria, (error) => {
    reportEntryFailure(deps, error);
  });

  const lookup = makeReferenceLookup(deps);
  const groups: SecurityGroup[] = [];

  for (let index = 0; index < candidates.length; index += BUILD_CONCURRENCY) {
    const batch = candidates.slice(index, index + BUILD_CONCURRENCY);
    const built = await Promise.all(
      batch.map((candidate) =>
        buildSecurityGroup(deps, candidate.entry, candidate.key, input.includeRules, lookup)
      )
    );

    for (const result of built) {
      if (result.isOk()) {
        groups.push(result.value);
        continue;
      }
      if (isEntryError(result.error)) {
        reportEntryFailure(deps, result.error);
        continue;
      }
      return err(result.error);
    }
  }

  return ok(groups.sort(compareSecurityGroups));
};
