/**
 * Use case: build the security group view of one cached entry.
 */

import { err, ok, type Result } from 'neverthrow';

import { parseIngressPermissions, parseSecurityGroupHeader } from '../attributes.js';
import {
  reconstructInboundRules,
  type ReconstructInboundRulesDeps,
  type ReferenceLookup,
} from './reconstruct-inbound-rules.js';

import type { MalformedEntryError } from '../errors.js';
import type { InboundRule, ResourceKey, SecurityGroup } from '../types.js';
import type { CacheEntry, CacheError } from '@/infra/cache/ports.js';

export type BuildSecurityGroupDeps = ReconstructInboundRulesDeps;

/**
 * Build a security group from its entry and decoded key.
 *
 * Identity (id, name, account, region, vpcId) comes from the key. When
 * `includeRules` is false, permissions are neither read nor validated.
 */
export const buildSecurityGroup = async (
  deps: BuildSecurityGroupDeps,
  entry: CacheEntry,
  key: ResourceKey,
  includeRules: boolean,
  lookup?: ReferenceLookup
): Promise<Result<SecurityGroup, MalformedEntryError | CacheError>> => {
  const header = parseSecurityGroupHeader(entry.key, entry.attributes);
  if (header.isErr()) {
    return err(header.error);
  }

  let inboundRules: InboundRule[] = [];
  if (includeRules) {
    const permissions = parseIngressPermissions(entry.key, entry.attributes);
    if (permissions.isErr()) {
      return err(permissions.error);
    }

    const rules = await reconstructInboundRules(
      deps,
      {
        account: key.account,
        region: key.region,
        ...(key.vpcId !== undefined && { vpcId: key.vpcId }),
      },
      permissions.value,
      lookup
    );
    if (rules.isErr()) {
      return err(rules.error);
    }
    inboundRules = rules.value;
  }

  const accountId = deps.accountResolver.resolveByName(key.account)?.accountId;

  return ok({
    id: key.id,
    name: key.name,
    description: header.value.description,
    accountName: key.account,
    ...(accountId !== undefined && { accountId }),
    region: key.region,
    ...(key.vpcId !== undefined && { vpcId: key.vpcId }),
    inboundRules,
    tags: header.value.tags,
  });
};
