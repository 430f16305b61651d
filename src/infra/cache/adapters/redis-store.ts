/**
 * Redis cache store adapter using ioredis.
 *
 * Layout per namespace:
 * - `{prefix}:{namespace}:entry:{key}`  serialized entry (string)
 * - `{prefix}:{namespace}:members`      set of entry keys
 */

import { Redis } from 'ioredis';
import { err, ok, type Result } from 'neverthrow';

import { CacheError as CacheErrorFactory, type CacheError } from '../ports.js';
import { deepFreeze, deserializeEntry, serializeEntry } from '../serialization.js';

import type { CacheEntry, CacheReadResult, CacheStats, CacheStorePort } from '../ports.js';

export interface RedisStoreOptions {
  /** Redis connection URL */
  url: string;
  /** Key prefix for all store keys. Default: 'inventory' */
  keyPrefix?: string;
  /** Connection timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
  /** Command timeout in milliseconds. Default: 1000 */
  commandTimeoutMs?: number;
  /** Members fetched per SSCAN round trip. Default: 500 */
  scanCount?: number;
}

/**
 * The Redis commands the store relies on.
 * Narrow enough to be served by an in-process fake in tests.
 */
export interface RedisStoreCommands {
  mget(keys: string[]): Promise<(string | null)[]>;
  get(key: string): Promise<string | null>;
  smembers(key: string): Promise<string[]>;
  sscan(key: string, cursor: string, pattern: string, count: number): Promise<[string, string[]]>;
  /** Set every value and add every member atomically. */
  writeEntries(
    values: readonly (readonly [string, string])[],
    membersKey: string,
    members: readonly string[]
  ): Promise<void>;
}

/**
 * Adapt an ioredis client to the command set used by the store.
 */
export const toRedisStoreCommands = (client: Redis): RedisStoreCommands => ({
  mget: (keys) => client.mget(keys),
  get: (key) => client.get(key),
  smembers: (key) => client.smembers(key),
  sscan: (key, cursor, pattern, count) => client.sscan(key, cursor, 'MATCH', pattern, 'COUNT', count),
  async writeEntries(values, membersKey, members) {
    const transaction = client.multi();
    for (const [key, value] of values) {
      transaction.set(key, value);
    }
    transaction.sadd(membersKey, [...members]);

    const replies = await transaction.exec();
    if (replies === null) {
      throw new Error('Redis transaction aborted');
    }
    for (const [replyError] of replies) {
      if (replyError !== null) {
        throw replyError;
      }
    }
  },
});

/**
 * Wrap a Redis operation with error handling.
 */
const wrapRedisOp = async <T>(
  op: () => Promise<T>,
  errorMessage: string
): Promise<Result<T, CacheError>> => {
  try {
    const result = await op();
    return ok(result);
  } catch (cause) {
    if (cause instanceof Error) {
      const message = cause.message.toLowerCase();
      if (
        message.includes('etimedout') ||
        message.includes('timeout') ||
        message.includes('timed out')
      ) {
        return err(CacheErrorFactory.timeout(errorMessage, cause));
      }
    }
    return err(CacheErrorFactory.connection(errorMessage, cause));
  }
};

/**
 * Create a Redis store.
 * Delegates to createRedisStoreFromCommands after instantiating the client.
 */
export const createRedisCacheStore = (
  options: RedisStoreOptions
): { store: CacheStorePort; client: Redis } => {
  const client = new Redis(options.url, {
    connectTimeout: options.connectTimeoutMs ?? 5000,
    commandTimeout: options.commandTimeoutMs ?? 1000,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => Math.min(times * 100, 30000),
    lazyConnect: true,
  });

  const store = createRedisStoreFromCommands(toRedisStoreCommands(client), {
    ...(options.keyPrefix !== undefined && { keyPrefix: options.keyPrefix }),
    ...(options.scanCount !== undefined && { scanCount: options.scanCount }),
  });

  return { store, client };
};

/**
 * Create a Redis store from an existing command set.
 */
export const createRedisStoreFromCommands = (
  commands: RedisStoreCommands,
  options: { keyPrefix?: string; scanCount?: number } = {}
): CacheStorePort => {
  const keyPrefix = options.keyPrefix ?? 'inventory';
  const scanCount = options.scanCount ?? 500;

  let hits = 0;
  let misses = 0;

  const entryKey = (namespace: string, key: string): string =>
    `${keyPrefix}:${namespace}:entry:${key}`;
  const membersKey = (namespace: string): string => `${keyPrefix}:${namespace}:members`;

  const write = async (
    namespace: string,
    entries: readonly CacheEntry[]
  ): Promise<Result<void, CacheError>> => {
    if (entries.length === 0) {
      return ok(undefined);
    }

    const values = entries.map(
      (entry) => [entryKey(namespace, entry.key), serializeEntry(entry)] as const
    );
    const members = entries.map((entry) => entry.key);

    return wrapRedisOp(
      () => commands.writeEntries(values, membersKey(namespace), members),
      `Failed to write ${String(entries.length)} entries to namespace: ${namespace}`
    );
  };

  /**
   * Load entries for member keys. Members whose value has gone missing are
   * skipped; values that fail to decode are returned as unreadable.
   */
  const load = async (
    namespace: string,
    keys: readonly string[]
  ): Promise<Result<CacheReadResult, CacheError>> => {
    if (keys.length === 0) {
      return ok({ entries: [], unreadable: [] });
    }

    const raw = await wrapRedisOp(
      () => commands.mget(keys.map((key) => entryKey(namespace, key))),
      `Failed to load entries from namespace: ${namespace}`
    );
    if (raw.isErr()) {
      return err(raw.error);
    }

    const result: CacheReadResult = { entries: [], unreadable: [] };
    raw.value.forEach((value, index) => {
      const key = keys[index];
      if (value === null || key === undefined) {
        return;
      }
      const decoded = deserializeEntry(value);
      if (decoded.isErr()) {
        result.unreadable.push({ key, error: decoded.error });
        return;
      }
      result.entries.push(deepFreeze(decoded.value));
    });
    return ok(result);
  };

  return {
    merge(namespace: string, entry: CacheEntry) {
      return write(namespace, [entry]);
    },

    mergeAll(namespace: string, entries: readonly CacheEntry[]) {
      return write(namespace, entries);
    },

    async get(namespace: string, key: string) {
      const raw = await wrapRedisOp(
        () => commands.get(entryKey(namespace, key)),
        `Failed to get key: ${key}`
      );
      if (raw.isErr()) {
        return err(raw.error);
      }

      if (raw.value === null) {
        misses++;
        return ok(undefined);
      }

      const decoded = deserializeEntry(raw.value);
      if (decoded.isErr()) {
        misses++;
        return err(decoded.error);
      }

      hits++;
      return ok(deepFreeze(decoded.value));
    },

    async getAll(namespace: string) {
      const keys = await wrapRedisOp(
        () => commands.smembers(membersKey(namespace)),
        `Failed to list namespace: ${namespace}`
      );
      if (keys.isErr()) {
        return err(keys.error);
      }
      return load(namespace, keys.value);
    },

    async filter(namespace: string, pattern: string) {
      const matched = new Set<string>();

      const scan = await wrapRedisOp(async () => {
        let cursor = '0';
        do {
          const [nextCursor, keys] = await commands.sscan(
            membersKey(namespace),
            cursor,
            pattern,
            scanCount
          );
          cursor = nextCursor;
          for (const key of keys) {
            matched.add(key);
          }
        } while (cursor !== '0');
      }, `Failed to filter namespace: ${namespace}`);

      if (scan.isErr()) {
        return err(scan.error);
      }
      return load(namespace, [...matched]);
    },

    stats(): Promise<CacheStats> {
      // Size would need a SCARD per namespace; hits/misses are tracked locally.
      return Promise.resolve({ hits, misses, size: 0 });
    },
  };
};
