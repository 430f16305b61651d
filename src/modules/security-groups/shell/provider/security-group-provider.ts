/**
 * Read API over cached security groups.
 */

import { forComponent } from '@/infra/logger/index.js';

import { getSecurityGroup } from '../../core/usecases/get-security-group.js';
import { listSecurityGroups } from '../../core/usecases/list-security-groups.js';

import type { SecurityGroupError } from '../../core/errors.js';
import type { KeySchema } from '../../core/keys.js';
import type { ReconstructionFailureReporter, SecurityGroupRepository } from '../../core/ports.js';
import type { SecurityGroup } from '../../core/types.js';
import type { CacheError } from '@/infra/cache/ports.js';
import type { AccountResolver } from '@/modules/accounts/index.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export interface SecurityGroupProvider {
  getAll(includeRules: boolean): Promise<Result<SecurityGroup[], CacheError>>;

  getAllByRegion(includeRules: boolean, region: string): Promise<Result<SecurityGroup[], CacheError>>;

  getAllByAccount(
    includeRules: boolean,
    account: string
  ): Promise<Result<SecurityGroup[], CacheError>>;

  getAllByAccountAndRegion(
    includeRules: boolean,
    account: string,
    region: string
  ): Promise<Result<SecurityGroup[], CacheError>>;

  /**
   * A VPC-scoped and a non-VPC group may share a name; both are returned.
   */
  getAllByAccountAndName(
    includeRules: boolean,
    account: string,
    name: string
  ): Promise<Result<SecurityGroup[], CacheError>>;

  /**
   * Exact lookup by name, always with rules.
   * Without `vpcId`, the group outside any VPC is preferred; several
   * VPC-scoped matches give an `AmbiguousSecurityGroup` error.
   */
  get(
    account: string,
    region: string,
    name: string,
    vpcId?: string
  ): Promise<Result<SecurityGroup | null, SecurityGroupError>>;

  /**
   * Exact lookup by id, with the same VPC handling as `get`.
   */
  getById(
    account: string,
    region: string,
    id: string,
    vpcId?: string
  ): Promise<Result<SecurityGroup | null, SecurityGroupError>>;
}

export interface MakeSecurityGroupProviderDeps {
  repo: SecurityGroupRepository;
  keys: KeySchema;
  accountResolver: AccountResolver;
  logger: Logger;
  /** Called for every cached entry left out of a result. */
  onReconstructionFailure?: ReconstructionFailureReporter | undefined;
}

export const makeSecurityGroupProvider = (
  deps: MakeSecurityGroupProviderDeps
): SecurityGroupProvider => {
  const useCaseDeps = {
    repo: deps.repo,
    keys: deps.keys,
    accountResolver: deps.accountResolver,
    logger: forComponent(deps.logger, 'security-groups'),
    onReconstructionFailure: deps.onReconstructionFailure,
  };

  return {
    getAll: (includeRules) => listSecurityGroups(useCaseDeps, { criteria: {}, includeRules }),

    getAllByRegion: (includeRules, region) =>
      listSecurityGroups(useCaseDeps, { criteria: { region }, includeRules }),

    getAllByAccount: (includeRules, account) =>
      listSecurityGroups(useCaseDeps, { criteria: { account }, includeRules }),

    getAllByAccountAndRegion: (includeRules, account, region) =>
      listSecurityGroups(useCaseDeps, { criteria: { account, region }, includeRules }),

    getAllByAccountAndName: (includeRules, account, name) =>
      listSecurityGroups(useCaseDeps, { criteria: { account, name }, includeRules }),

    get: (account, region, name, vpcId) =>
      getSecurityGroup(useCaseDeps, { account, region, name, vpcId }),

    getById: (account, region, id, vpcId) =>
      getSecurityGroup(useCaseDeps, { account, region, id, vpcId }),
  };
};
