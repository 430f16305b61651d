/**
 * Validation and mapping of cached security group attributes.
 */

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors } from '@/common/types/errors.js';

import { createMalformedEntryError, type MalformedEntryError } from './errors.js';
import {
  ALL_PORTS,
  RawIpPermissionsSchema,
  RawSecurityGroupAttributesSchema,
  type CidrBlock,
  type CrossReference,
  type IngressPermission,
  type RawIpPermission,
  type Tag,
} from './types.js';

const headerValidator = TypeCompiler.Compile(RawSecurityGroupAttributesSchema);
const permissionsValidator = TypeCompiler.Compile(RawIpPermissionsSchema);

export interface SecurityGroupHeader {
  description: string;
  tags: Tag[];
}

/**
 * Read the descriptive fields of a cached group.
 */
export const parseSecurityGroupHeader = (
  key: string,
  attributes: Readonly<Record<string, unknown>>
): Result<SecurityGroupHeader, MalformedEntryError> => {
  if (!headerValidator.Check(attributes)) {
    return err(
      createMalformedEntryError(
        key,
        'Security group attributes failed validation',
        formatSchemaErrors(headerValidator.Errors(attributes))
      )
    );
  }

  const { description, tags } = attributes;
  return ok({
    description: description ?? '',
    tags: (tags ?? []).map((tag) => ({ key: tag.key, value: tag.value ?? '' })),
  });
};

const toCrossReference = (
  pair: NonNullable<RawIpPermission['userIdGroupPairs']>[number]
): CrossReference => ({
  ownerId: pair.userId,
  ...(typeof pair.groupId === 'string' && { groupId: pair.groupId }),
  ...(typeof pair.groupName === 'string' && { groupName: pair.groupName }),
  ...(typeof pair.vpcId === 'string' && { vpcId: pair.vpcId }),
});

const toIngressPermission = (raw: RawIpPermission): IngressPermission => {
  const ipv4Ranges: CidrBlock[] = [
    ...(raw.ipv4Ranges ?? []).map((range) => ({ cidr: range.cidrIp })),
    ...(raw.ipRanges ?? []).map((cidr) => ({ cidr })),
  ];

  return {
    protocol: raw.ipProtocol,
    fromPort: raw.fromPort ?? ALL_PORTS,
    toPort: raw.toPort ?? ALL_PORTS,
    ipv4Ranges,
    ipv6Ranges: (raw.ipv6Ranges ?? []).map((range) => ({ cidr: range.cidrIpv6 })),
    crossReferences: (raw.userIdGroupPairs ?? []).map(toCrossReference),
  };
};

/**
 * Read the ingress permissions of a cached group.
 * Missing or null `ipPermissions` means no permissions.
 */
export const parseIngressPermissions = (
  key: string,
  attributes: Readonly<Record<string, unknown>>
): Result<IngressPermission[], MalformedEntryError> => {
  const raw = attributes['ipPermissions'] ?? null;

  if (!permissionsValidator.Check(raw)) {
    return err(
      createMalformedEntryError(
        key,
        'Ingress permissions failed validation',
        formatSchemaErrors(permissionsValidator.Errors(raw))
      )
    );
  }

  return ok((raw ?? []).map(toIngressPermission));
};
