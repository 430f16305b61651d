/**
 * Pure rule reconstruction steps: expand raw permissions, group tuples by
 * rule identity, and order the result.
 */

import type {
  AddressRange,
  CrossReference,
  InboundRule,
  IngressPermission,
  PortRange,
  SecurityGroupSummary,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Expansion
// ─────────────────────────────────────────────────────────────────────────────

export interface RangeTuple {
  protocol: string;
  portRange: PortRange;
  range: AddressRange;
}

export interface ReferenceTuple {
  protocol: string;
  portRange: PortRange;
  reference: CrossReference;
}

export interface ResolvedReferenceTuple {
  protocol: string;
  portRange: PortRange;
  group: SecurityGroupSummary;
}

export interface ExpandedPermissions {
  ranges: RangeTuple[];
  references: ReferenceTuple[];
}

/**
 * Split a CIDR block into address and `/prefix`.
 * A block without a prefix keeps an empty `cidr`.
 */
export const parseAddressRange = (block: string): AddressRange => {
  const slash = block.indexOf('/');
  if (slash === -1) {
    return { ip: block, cidr: '' };
  }
  return { ip: block.slice(0, slash), cidr: block.slice(slash) };
};

/**
 * One tuple per listed range and one per cross-reference.
 * Protocol is kept exactly as stored.
 */
export const expandPermissions = (
  permissions: readonly IngressPermission[]
): ExpandedPermissions => {
  const ranges: RangeTuple[] = [];
  const references: ReferenceTuple[] = [];

  for (const permission of permissions) {
    const { protocol } = permission;
    const portRange: PortRange = { startPort: permission.fromPort, endPort: permission.toPort };

    for (const block of [...permission.ipv4Ranges, ...permission.ipv6Ranges]) {
      ranges.push({ protocol, portRange, range: parseAddressRange(block.cidr) });
    }
    for (const reference of permission.crossReferences) {
      references.push({ protocol, portRange, reference });
    }
  }

  return { ranges, references };
};

// ─────────────────────────────────────────────────────────────────────────────
// Ordering
// ─────────────────────────────────────────────────────────────────────────────

const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const comparePortRanges = (a: PortRange, b: PortRange): number =>
  a.startPort - b.startPort || a.endPort - b.endPort;

const identityOf = (rule: InboundRule): [string, string] =>
  rule.type === 'range' ? [rule.range.ip, rule.range.cidr] : [rule.referencedGroup.id, ''];

/**
 * Total order over both rule variants: address or referenced group id first,
 * then cidr, then protocol, then variant.
 */
export const compareInboundRules = (a: InboundRule, b: InboundRule): number => {
  const [aPrimary, aSecondary] = identityOf(a);
  const [bPrimary, bSecondary] = identityOf(b);

  return (
    compareStrings(aPrimary, bPrimary) ||
    compareStrings(aSecondary, bSecondary) ||
    compareStrings(a.protocol, b.protocol) ||
    compareStrings(a.type, b.type)
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Grouping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Deduplicate and sort port ranges. Overlapping or adjacent ranges are kept
 * as they are.
 */
export const toPortRangeSet = (ranges: Iterable<PortRange>): PortRange[] => {
  const unique = new Map<string, PortRange>();
  for (const range of ranges) {
    unique.set(`${String(range.startPort)}:${String(range.endPort)}`, {
      startPort: range.startPort,
      endPort: range.endPort,
    });
  }
  return [...unique.values()].sort(comparePortRanges);
};

const definedFieldCount = (summary: SecurityGroupSummary): number =>
  Object.values(summary).filter((value) => value !== undefined).length;

/**
 * Pick one summary for a referenced group seen several times: the most
 * complete one, then the lexically smallest, so input order never matters.
 */
const pickSummary = (
  current: SecurityGroupSummary,
  candidate: SecurityGroupSummary
): SecurityGroupSummary => {
  const byFields = definedFieldCount(candidate) - definedFieldCount(current);
  if (byFields !== 0) {
    return byFields > 0 ? candidate : current;
  }
  return compareStrings(JSON.stringify(candidate), JSON.stringify(current)) < 0
    ? candidate
    : current;
};

interface RangeGroup {
  protocol: string;
  range: AddressRange;
  portRanges: PortRange[];
}

interface ReferenceGroup {
  protocol: string;
  group: SecurityGroupSummary;
  portRanges: PortRange[];
}

/**
 * Group tuples by rule identity and return the ordered rule list.
 *
 * Range rules are keyed by (protocol, ip, cidr); reference rules by
 * (protocol, referenced group id).
 */
export const groupInboundRules = (
  ranges: readonly RangeTuple[],
  references: readonly ResolvedReferenceTuple[]
): InboundRule[] => {
  const rangeGroups = new Map<string, RangeGroup>();
  for (const tuple of ranges) {
    const identity = JSON.stringify([tuple.protocol, tuple.range.ip, tuple.range.cidr]);
    const group = rangeGroups.get(identity);
    if (group === undefined) {
      rangeGroups.set(identity, {
        protocol: tuple.protocol,
        range: tuple.range,
        portRanges: [tuple.portRange],
      });
    } else {
      group.portRanges.push(tuple.portRange);
    }
  }

  const referenceGroups = new Map<string, ReferenceGroup>();
  for (const tuple of references) {
    const identity = JSON.stringify([tuple.protocol, tuple.group.id]);
    const group = referenceGroups.get(identity);
    if (group === undefined) {
      referenceGroups.set(identity, {
        protocol: tuple.protocol,
        group: tuple.group,
        portRanges: [tuple.portRange],
      });
    } else {
      group.group = pickSummary(group.group, tuple.group);
      group.portRanges.push(tuple.portRange);
    }
  }

  const rules: InboundRule[] = [];
  for (const group of rangeGroups.values()) {
    rules.push({
      type: 'range',
      protocol: group.protocol,
      portRanges: toPortRangeSet(group.portRanges),
      range: { ip: group.range.ip, cidr: group.range.cidr },
    });
  }
  for (const group of referenceGroups.values()) {
    rules.push({
      type: 'reference',
      protocol: group.protocol,
      portRanges: toPortRangeSet(group.portRanges),
      referencedGroup: { ...group.group },
    });
  }

  return rules.sort(compareInboundRules);
};
