import { hasCriteria, type KeySchema } from '../../core/keys.js';
import { SECURITY_GROUP_TYPE, SECURITY_GROUPS_NAMESPACE } from '../../core/types.js';

import type { SecurityGroupRepository } from '../../core/ports.js';
import type { CacheStorePort } from '@/infra/cache/ports.js';

export interface SecurityGroupRepoOptions {
  store: CacheStorePort;
  keys: KeySchema;
  /** Namespace holding security group entries. Defaults to 'security-groups'. */
  namespace?: string;
}

/**
 * Security group repository over the inventory cache store.
 * Unconstrained criteria read the whole namespace; anything else is a pattern scan.
 */
export const makeSecurityGroupRepo = (options: SecurityGroupRepoOptions): SecurityGroupRepository => {
  const { store, keys } = options;
  const namespace = options.namespace ?? SECURITY_GROUPS_NAMESPACE;

  return {
    findEntries(criteria) {
      if (!hasCriteria(criteria)) {
        return store.getAll(namespace);
      }
      return store.filter(namespace, keys.buildPattern(SECURITY_GROUP_TYPE, criteria));
    },
  };
};
