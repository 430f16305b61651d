/**
 * Test fakes and mocks
 */

import { err, type Result } from 'neverthrow';

import { createGlobMatcher } from '@/infra/cache/glob.js';

import type { CacheError, CacheStorePort, RedisStoreCommands } from '@/infra/cache/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Redis
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeRedisCommands extends RedisStoreCommands {
  /** Raw string values by Redis key */
  readonly values: Map<string, string>;
  /** Set members by Redis key */
  readonly sets: Map<string, Set<string>>;
  /** Number of SSCAN round trips served */
  scanCalls(): number;
  /** Make every following command reject with this error */
  failWith(error: Error | undefined): void;
}

/**
 * In-process stand-in for the Redis commands used by the Redis store.
 * SSCAN pages through members in insertion order, `count` at a time.
 */
export const makeFakeRedisCommands = (): FakeRedisCommands => {
  const values = new Map<string, string>();
  const sets = new Map<string, Set<string>>();
  let failure: Error | undefined;
  let scans = 0;

  const guard = async <T>(op: () => T): Promise<T> => {
    if (failure !== undefined) {
      throw failure;
    }
    return op();
  };

  return {
    values,
    sets,
    scanCalls: () => scans,
    failWith(error) {
      failure = error;
    },

    mget: (keys) => guard(() => keys.map((key) => values.get(key) ?? null)),

    get: (key) => guard(() => values.get(key) ?? null),

    smembers: (key) => guard(() => [...(sets.get(key) ?? [])]),

    sscan: (key, cursor, pattern, count) =>
      guard((): [string, string[]] => {
        scans++;
        const members = [...(sets.get(key) ?? [])];
        const start = Number(cursor);
        const end = start + count;
        const matches = createGlobMatcher(pattern);
        const page = members.slice(start, end).filter(matches);
        return [end >= members.length ? '0' : String(end), page];
      }),

    writeEntries: (entries, membersKey, members) =>
      guard(() => {
        for (const [key, value] of entries) {
          values.set(key, value);
        }
        const set = sets.get(membersKey) ?? new Set<string>();
        for (const member of members) {
          set.add(member);
        }
        sets.set(membersKey, set);
      }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Cache store
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A store whose every read fails with the given error.
 */
export const makeFailingCacheStore = (error: CacheError): CacheStorePort => {
  const fail = <T>(): Promise<Result<T, CacheError>> => Promise.resolve(err(error));

  return {
    merge: () => fail(),
    mergeAll: () => fail(),
    get: () => fail(),
    getAll: () => fail(),
    filter: () => fail(),
    stats: () => Promise.resolve({ hits: 0, misses: 0, size: 0 }),
  };
};
