/**
 * Domain error types for the Accounts module.
 */

export type AccountsFileError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | { type: 'DuplicateAccount'; message: string; field: 'name' | 'accountId'; value: string };
