/**
 * Accounts Module - Public API
 *
 * Resolves account names to provider account ids and back.
 */

export {
  makeAccountResolver,
  checkUniqueAccounts,
  type AccountResolver,
} from './core/account-resolver.js';
export { loadAccountsFile } from './shell/accounts-file.js';

export type { Account, AccountsFileDTO } from './core/types.js';
export { AccountSchema, AccountsFileSchema } from './core/types.js';
export type { AccountsFileError } from './core/errors.js';
