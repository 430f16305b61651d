/**
 * Domain types for the Accounts module.
 *
 * An account pairs the control plane's account name with the provider-native
 * account id that appears as `ownerId` in cached resources.
 */

import { Type, type Static } from '@sinclair/typebox';

export const AccountSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  accountId: Type.String({ minLength: 1 }),
});

export type Account = Static<typeof AccountSchema>;

/**
 * Accounts file layout:
 *
 * ```yaml
 * accounts:
 *   - name: prod
 *     accountId: "123456789012"
 * ```
 */
export const AccountsFileSchema = Type.Object({
  accounts: Type.Array(AccountSchema),
});

export type AccountsFileDTO = Static<typeof AccountsFileSchema>;
