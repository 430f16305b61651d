import { err, ok, type Result } from 'neverthrow';

import type { AccountsFileError } from './errors.js';
import type { Account } from './types.js';

/**
 * Lookup between account names and provider account ids.
 * Backed by a fixed account list; misses are not remembered.
 */
export interface AccountResolver {
  resolveByAccountId(accountId: string): Account | undefined;
  resolveByName(name: string): Account | undefined;
  list(): readonly Account[];
}

/**
 * Build a resolver over an account list.
 * When names or ids repeat, the first occurrence wins.
 */
export const makeAccountResolver = (accounts: readonly Account[]): AccountResolver => {
  const snapshot = Object.freeze(accounts.map((account) => Object.freeze({ ...account })));
  const byId = new Map<string, Account>();
  const byName = new Map<string, Account>();

  for (const account of snapshot) {
    if (!byId.has(account.accountId)) byId.set(account.accountId, account);
    if (!byName.has(account.name)) byName.set(account.name, account);
  }

  return {
    resolveByAccountId: (accountId) => byId.get(accountId),
    resolveByName: (name) => byName.get(name),
    list: () => snapshot,
  };
};

/**
 * Reject account lists that repeat a name or an account id.
 */
export const checkUniqueAccounts = (
  accounts: readonly Account[]
): Result<readonly Account[], AccountsFileError> => {
  const names = new Set<string>();
  const ids = new Set<string>();

  for (const account of accounts) {
    if (names.has(account.name)) {
      return err({
        type: 'DuplicateAccount',
        message: `Account name '${account.name}' is configured more than once`,
        field: 'name',
        value: account.name,
      });
    }
    if (ids.has(account.accountId)) {
      return err({
        type: 'DuplicateAccount',
        message: `Account id '${account.accountId}' is configured more than once`,
        field: 'accountId',
        value: account.accountId,
      });
    }
    names.add(account.name);
    ids.add(account.accountId);
  }

  return ok(accounts);
};
