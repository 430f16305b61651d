/**
 * JSON serialization for cache entries stored by out-of-process backends.
 */

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { CacheError, type CacheEntry } from './ports.js';

const StoredEntrySchema = Type.Object({
  key: Type.String(),
  attributes: Type.Record(Type.String(), Type.Unknown()),
  relationships: Type.Record(Type.String(), Type.Array(Type.String())),
});

const storedEntryValidator = TypeCompiler.Compile(StoredEntrySchema);

/**
 * Serialize an entry to a JSON string.
 */
export const serializeEntry = (entry: CacheEntry): string => {
  return JSON.stringify({
    key: entry.key,
    attributes: entry.attributes,
    relationships: entry.relationships,
  });
};

/**
 * Deserialize and shape-check a stored entry.
 */
export const deserializeEntry = (json: string): Result<CacheEntry, CacheError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (cause) {
    return err(CacheError.serialization('Failed to deserialize cached entry', cause));
  }

  if (!storedEntryValidator.Check(parsed)) {
    const first = storedEntryValidator.Errors(parsed).First();
    const detail = first !== undefined ? `${first.path}: ${first.message}` : 'unknown shape';
    return err(CacheError.serialization(`Cached entry has an invalid shape (${detail})`));
  }

  return ok(parsed);
};

/**
 * Recursively freeze a value so callers cannot mutate shared entries.
 */
export const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};
