/**
 * Use case: get a single security group by name or id.
 */

import { err, ok, type Result } from 'neverthrow';

import { chooseCandidate, selectCandidates, unreadableEntryErrors } from '../candidates.js';
import { isEntryError, type SecurityGroupError } from '../errors.js';
import { buildSecurityGroup } from './build-security-group.js';
import { reportEntryFailure } from './report-failure.js';

import type { ListSecurityGroupsDeps } from './list-security-groups.js';
import type { KeyCriteria, SecurityGroup } from '../types.js';

export type GetSecurityGroupDeps = ListSecurityGroupsDeps;

export type GetSecurityGroupInput = {
  account: string;
  region: string;
  /** Restrict to one VPC. When absent, see `chooseCandidate`. */
  vpcId?: string | undefined;
} & ({ name: string; id?: never } | { id: string; name?: never });

/**
 * Get one security group with its inbound rules.
 *
 * Returns null when nothing matches or the matching entry is malformed.
 * Entries whose value cannot be decoded are reported and never chosen.
 */
export const getSecurityGroup = async (
  deps: GetSecurityGroupDeps,
  input: GetSecurityGroupInput
): Promise<Result<SecurityGroup | null, SecurityGroupError>> => {
  const criteria: KeyCriteria = {
    account: input.account,
    region: input.region,
    ...(input.name !== undefined && { name: input.name }),
    ...(input.id !== undefined && { id: input.id }),
    ...(input.vpcId !== undefined && { vpcId: input.vpcId }),
  };

  const entries = await deps.repo.findEntries(criteria);
  if (entries.isErr()) {
    return err(entries.error);
  }

  for (const failure of unreadableEntryErrors(deps.keys, entries.value.unreadable, criteria)) {
    reportEntryFailure(deps, failure);
  }

  const candidates = selectCandidates(deps.keys, entries.value.entries, criteria, (error) => {
    reportEntryFailure(deps, error);
  });

  const chosen = chooseCandidate(candidates, input.vpcId);
  if (chosen.isErr()) {
    return err(chosen.error);
  }
  if (chosen.value === undefined) {
    return ok(null);
  }

  const built = await buildSecurityGroup(deps, chosen.value.entry, chosen.value.key, true);
  if (built.isErr()) {
    if (isEntryError(built.error)) {
      reportEntryFailure(deps, built.error);
      return ok(null);
    }
    return err(built.error);
  }

  return ok(built.value);
};
