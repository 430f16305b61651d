import fs from 'node:fs/promises';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { formatSchemaErrors } from '@/common/types/errors.js';

import { checkUniqueAccounts } from '../core/account-resolver.js';
import { AccountsFileSchema, type Account } from '../core/types.js';

import type { AccountsFileError } from '../core/errors.js';

const validator = TypeCompiler.Compile(AccountsFileSchema);

/**
 * Read the configured accounts from a YAML file.
 */
export const loadAccountsFile = async (
  filePath: string
): Promise<Result<readonly Account[], AccountsFileError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Accounts file not found at ${filePath}`,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read accounts file at ${filePath}: ${(error as Error).message}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${filePath}: ${(error as Error).message}`,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  const accounts = checkUniqueAccounts(parsed.accounts);
  if (accounts.isErr()) {
    return err(accounts.error);
  }

  return ok(accounts.value.map(({ name, accountId }) => ({ name, accountId })));
};
