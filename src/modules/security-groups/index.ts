/**
 * Security Groups Module - Public API
 *
 * Reads cached security groups and rebuilds their inbound rules.
 */

// Types
export {
  SECURITY_GROUPS_NAMESPACE,
  SECURITY_GROUP_TYPE,
  ALL_PORTS,
  RawIpPermissionSchema,
  RawSecurityGroupAttributesSchema,
  type SecurityGroup,
  type SecurityGroupSummary,
  type InboundRule,
  type RangeRule,
  type ReferenceRule,
  type PortRange,
  type AddressRange,
  type Tag,
  type ResourceKey,
  type KeyCriteria,
  type CrossReference,
  type IngressPermission,
  type RawIpPermission,
  type RawSecurityGroupAttributes,
} from './core/types.js';

// Errors
export type {
  InvalidKeyError,
  MalformedEntryError,
  AmbiguousSecurityGroupError,
  EntryError,
  SecurityGroupError,
} from './core/errors.js';

// Keys
export {
  createKeySchema,
  matchesCriteria,
  hasCriteria,
  type KeySchema,
  type KeySchemaOptions,
} from './core/keys.js';

// Ports
export type {
  SecurityGroupRepository,
  ReconstructionFailure,
  ReconstructionFailureReporter,
} from './core/ports.js';

// Use cases
export {
  reconstructInboundRules,
  makeReferenceLookup,
  type ReconstructInboundRulesDeps,
  type ReferenceLookup,
  type OwningGroup,
} from './core/usecases/reconstruct-inbound-rules.js';
export {
  listSecurityGroups,
  compareSecurityGroups,
  BUILD_CONCURRENCY,
  type ListSecurityGroupsDeps,
  type ListSecurityGroupsInput,
} from './core/usecases/list-security-groups.js';
export {
  getSecurityGroup,
  type GetSecurityGroupDeps,
  type GetSecurityGroupInput,
} from './core/usecases/get-security-group.js';

// Shell
export { makeSecurityGroupRepo, type SecurityGroupRepoOptions } from './shell/repo/cache-repo.js';
export {
  makeSecurityGroupProvider,
  type SecurityGroupProvider,
  type MakeSecurityGroupProviderDeps,
} from './shell/provider/security-group-provider.js';
