/**
 * Domain types for the Security Groups module.
 *
 * Security groups are read from the inventory cache and rebuilt into typed
 * views: each group carries its inbound rules, grouped and deduplicated.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Cache namespace holding security group entries */
export const SECURITY_GROUPS_NAMESPACE = 'security-groups';

/** Resource type segment of security group keys */
export const SECURITY_GROUP_TYPE = 'security-group';

/** Port sentinel the provider uses for "all ports" */
export const ALL_PORTS = -1;

// ─────────────────────────────────────────────────────────────────────────────
// Keys
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decoded identity of a cached resource.
 */
export interface ResourceKey {
  type: string;
  account: string;
  region: string;
  name: string;
  id: string;
  vpcId?: string;
}

/**
 * Partial identity used to select cached resources.
 * Unset fields match anything; `vpcId: null` matches only resources outside a VPC.
 */
export interface KeyCriteria {
  account?: string;
  region?: string;
  name?: string;
  id?: string;
  vpcId?: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Raw Permissions
// ─────────────────────────────────────────────────────────────────────────────

export interface CidrBlock {
  cidr: string;
}

/**
 * A permission naming another security group as the allowed source.
 */
export interface CrossReference {
  ownerId: string;
  groupId?: string;
  groupName?: string;
  vpcId?: string;
}

/**
 * One access-control record as stored by the provider, before grouping.
 */
export interface IngressPermission {
  protocol: string;
  fromPort: number;
  toPort: number;
  ipv4Ranges: CidrBlock[];
  ipv6Ranges: CidrBlock[];
  crossReferences: CrossReference[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Rules
// ─────────────────────────────────────────────────────────────────────────────

export interface PortRange {
  startPort: number;
  endPort: number;
}

/**
 * Network address split into its address and `/prefix` parts.
 */
export interface AddressRange {
  ip: string;
  cidr: string;
}

/**
 * By-value reference to another security group. Fields the cache could not
 * supply are absent.
 */
export interface SecurityGroupSummary {
  id: string;
  name?: string;
  accountName?: string;
  accountId?: string;
  region: string;
  vpcId?: string;
}

export interface RangeRule {
  type: 'range';
  protocol: string;
  /** Sorted by (startPort, endPort), no duplicates */
  portRanges: PortRange[];
  range: AddressRange;
}

export interface ReferenceRule {
  type: 'reference';
  protocol: string;
  /** Sorted by (startPort, endPort), no duplicates */
  portRanges: PortRange[];
  referencedGroup: SecurityGroupSummary;
}

export type InboundRule = RangeRule | ReferenceRule;

// ─────────────────────────────────────────────────────────────────────────────
// Security Group
// ─────────────────────────────────────────────────────────────────────────────

export interface Tag {
  key: string;
  value: string;
}

export interface SecurityGroup {
  id: string;
  name: string;
  description: string;
  accountName: string;
  accountId?: string;
  region: string;
  vpcId?: string;
  /** Deduplicated and sorted; empty when rules were not requested */
  inboundRules: InboundRule[];
  tags: Tag[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Cached Attribute Schemas
// ─────────────────────────────────────────────────────────────────────────────

/** Flattened provider objects carry explicit nulls for unset fields. */
const Nullable = <T extends TSchema>(schema: T) => Type.Optional(Type.Union([schema, Type.Null()]));

export const RawIpv4RangeSchema = Type.Object({
  cidrIp: Type.String(),
  description: Nullable(Type.String()),
});

export const RawIpv6RangeSchema = Type.Object({
  cidrIpv6: Type.String(),
  description: Nullable(Type.String()),
});

export const RawGroupPairSchema = Type.Object({
  userId: Type.String(),
  groupId: Nullable(Type.String()),
  groupName: Nullable(Type.String()),
  vpcId: Nullable(Type.String()),
  description: Nullable(Type.String()),
});

export const RawIpPermissionSchema = Type.Object({
  ipProtocol: Type.String(),
  fromPort: Nullable(Type.Integer()),
  toPort: Nullable(Type.Integer()),
  ipv4Ranges: Nullable(Type.Array(RawIpv4RangeSchema)),
  ipv6Ranges: Nullable(Type.Array(RawIpv6RangeSchema)),
  /** Legacy flat list of ipv4 CIDR strings */
  ipRanges: Nullable(Type.Array(Type.String())),
  userIdGroupPairs: Nullable(Type.Array(RawGroupPairSchema)),
});

export const RawIpPermissionsSchema = Type.Union([Type.Array(RawIpPermissionSchema), Type.Null()]);

export const RawSecurityGroupAttributesSchema = Type.Object({
  groupId: Nullable(Type.String()),
  groupName: Nullable(Type.String()),
  description: Nullable(Type.String()),
  ownerId: Nullable(Type.String()),
  vpcId: Nullable(Type.String()),
  tags: Nullable(
    Type.Array(
      Type.Object({
        key: Type.String(),
        value: Nullable(Type.String()),
      })
    )
  ),
});

export type RawIpPermission = Static<typeof RawIpPermissionSchema>;
export type RawSecurityGroupAttributes = Static<typeof RawSecurityGroupAttributesSchema>;
