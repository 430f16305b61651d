/**
 * Use case: rebuild the inbound rules of one security group from its raw
 * ingress permissions, resolving security group cross-references.
 */

import { err, ok, type Result } from 'neverthrow';

import { matchesCriteria, type KeySchema } from '../keys.js';
import { expandPermissions, groupInboundRules, type ResolvedReferenceTuple } from '../rules.js';
import { SECURITY_GROUP_TYPE } from '../types.js';

import type { SecurityGroupRepository } from '../ports.js';
import type {
  CrossReference,
  InboundRule,
  IngressPermission,
  KeyCriteria,
  ResourceKey,
  SecurityGroupSummary,
} from '../types.js';
import type { AccountResolver } from '@/modules/accounts/index.js';
import type { CacheError } from '@/infra/cache/ports.js';
import type { Logger } from 'pino';

export interface ReconstructInboundRulesDeps {
  repo: SecurityGroupRepository;
  keys: KeySchema;
  accountResolver: AccountResolver;
  logger: Logger;
}

/**
 * The group whose rules are being rebuilt.
 */
export interface OwningGroup {
  account: string;
  region: string;
  vpcId?: string;
}

export type ReferenceLookup = (
  criteria: KeyCriteria,
  preferredVpcId: string | undefined
) => Promise<Result<ResourceKey | undefined, CacheError>>;

/**
 * Cache lookups memoized for as long as the lookup is kept, so a group
 * referenced several times is read once. A list call shares one lookup
 * across all of its groups.
 */
export const makeReferenceLookup = (deps: ReconstructInboundRulesDeps): ReferenceLookup => {
  const pending = new Map<string, Promise<Result<ResourceKey | undefined, CacheError>>>();

  const load = async (
    criteria: KeyCriteria,
    preferredVpcId: string | undefined
  ): Promise<Result<ResourceKey | undefined, CacheError>> => {
    const entries = await deps.repo.findEntries(criteria);
    if (entries.isErr()) {
      return err(entries.error);
    }

    // Only keys are needed, so groups with unreadable values still resolve.
    const found = [
      ...entries.value.entries.map((entry) => entry.key),
      ...entries.value.unreadable.map((entry) => entry.key),
    ];

    const matches: ResourceKey[] = [];
    for (const key of found) {
      const parsed = deps.keys.parse(key);
      if (
        parsed.isOk() &&
        parsed.value.type === SECURITY_GROUP_TYPE &&
        matchesCriteria(parsed.value, criteria)
      ) {
        matches.push(parsed.value);
      }
    }

    matches.sort((a, b) => {
      const left = JSON.stringify([a.name, a.id, a.vpcId ?? '']);
      const right = JSON.stringify([b.name, b.id, b.vpcId ?? '']);
      return left < right ? -1 : left > right ? 1 : 0;
    });

    const sameVpc = matches.find((match) => match.vpcId === preferredVpcId);
    return ok(sameVpc ?? matches[0]);
  };

  return (criteria, preferredVpcId) => {
    const cacheKey = JSON.stringify([criteria, preferredVpcId ?? null]);
    let lookup = pending.get(cacheKey);
    if (lookup === undefined) {
      lookup = load(criteria, preferredVpcId);
      pending.set(cacheKey, lookup);
    }
    return lookup;
  };
};

/**
 * Turn one cross-reference into a summary of the referenced group.
 *
 * - Same account with a known name: built from the reference alone.
 * - Other account, or no name: completed from the cache (vpcId, name).
 * - Unknown owner account or cache miss: partial summary from the reference.
 *
 * Returns undefined when the reference names no group id and no cached group
 * could supply one.
 */
const resolveReference = async (
  deps: ReconstructInboundRulesDeps,
  owner: OwningGroup,
  reference: CrossReference,
  lookup: ReferenceLookup
): Promise<Result<SecurityGroupSummary | undefined, CacheError>> => {
  const { ownerId, groupId, groupName } = reference;
  const accountName = deps.accountResolver.resolveByAccountId(ownerId)?.name;

  const partial: SecurityGroupSummary | undefined =
    groupId === undefined
      ? undefined
      : {
          id: groupId,
          ...(groupName !== undefined && { name: groupName }),
          ...(accountName !== undefined && { accountName }),
          accountId: ownerId,
          region: owner.region,
          ...(reference.vpcId !== undefined && { vpcId: reference.vpcId }),
        };

  if (groupName !== undefined && partial !== undefined && accountName === owner.account) {
    return ok(partial);
  }

  if (accountName === undefined) {
    return ok(partial);
  }

  let criteria: KeyCriteria;
  if (groupId !== undefined) {
    criteria = { account: accountName, region: owner.region, id: groupId };
  } else if (groupName !== undefined) {
    criteria = { account: accountName, region: owner.region, name: groupName };
  } else {
    return ok(undefined);
  }

  const match = await lookup(criteria, owner.vpcId);
  if (match.isErr()) {
    return err(match.error);
  }
  if (match.value === undefined) {
    return ok(partial);
  }

  const vpcId = match.value.vpcId ?? reference.vpcId;
  return ok({
    id: match.value.id,
    name: groupName ?? match.value.name,
    accountName,
    accountId: ownerId,
    region: owner.region,
    ...(vpcId !== undefined && { vpcId }),
  });
};

/**
 * Rebuild the sorted, deduplicated inbound rules of a group.
 *
 * Only a cache failure is returned as an error; references that cannot be
 * resolved degrade to partial summaries or are dropped with a warning.
 */
export const reconstructInboundRules = async (
  deps: ReconstructInboundRulesDeps,
  owner: OwningGroup,
  permissions: readonly IngressPermission[],
  lookup: ReferenceLookup = makeReferenceLookup(deps)
): Promise<Result<InboundRule[], CacheError>> => {
  const { ranges, references } = expandPermissions(permissions);

  const resolved = await Promise.all(
    references.map(async (tuple) => ({
      tuple,
      summary: await resolveReference(deps, owner, tuple.reference, lookup),
    }))
  );

  const referenceTuples: ResolvedReferenceTuple[] = [];
  for (const { tuple, summary } of resolved) {
    if (summary.isErr()) {
      return err(summary.error);
    }
    if (summary.value === undefined) {
      deps.logger.warn(
        { reference: tuple.reference, account: owner.account, region: owner.region },
        '[SecurityGroups] Dropping cross-reference without a resolvable group id'
      );
      continue;
    }
    referenceTuples.push({
      protocol: tuple.protocol,
      portRange: tuple.portRange,
      group: summary.value,
    });
  }

  return ok(groupInboundRules(ranges, referenceTuples));
};
