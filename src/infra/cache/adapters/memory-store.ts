/**
 * In-memory cache store.
 */

import { ok } from 'neverthrow';

import { createGlobMatcher } from '../glob.js';
import { deepFreeze } from '../serialization.js';

import type { CacheEntry, CacheStats, CacheStorePort } from '../ports.js';

/**
 * Create an in-memory namespaced store.
 *
 * Entries are copied and frozen on write; a merge swaps the map slot in one
 * step, so concurrent readers never observe a partially written entry.
 */
export const createMemoryCacheStore = (): CacheStorePort => {
  const namespaces = new Map<string, Map<string, CacheEntry>>();

  let hits = 0;
  let misses = 0;

  const namespaceMap = (namespace: string): Map<string, CacheEntry> => {
    let entries = namespaces.get(namespace);
    if (entries === undefined) {
      entries = new Map();
      namespaces.set(namespace, entries);
    }
    return entries;
  };

  const snapshot = (entry: CacheEntry): CacheEntry =>
    deepFreeze(structuredClone({
      key: entry.key,
      attributes: entry.attributes,
      relationships: entry.relationships,
    }));

  return {
    merge(namespace: string, entry: CacheEntry) {
      namespaceMap(namespace).set(entry.key, snapshot(entry));
      return Promise.resolve(ok(undefined));
    },

    mergeAll(namespace: string, entries: readonly CacheEntry[]) {
      const target = namespaceMap(namespace);
      for (const entry of entries) {
        target.set(entry.key, snapshot(entry));
      }
      return Promise.resolve(ok(undefined));
    },

    get(namespace: string, key: string) {
      const entry = namespaces.get(namespace)?.get(key);

      if (entry === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }

      hits++;
      return Promise.resolve(ok(entry));
    },

    getAll(namespace: string) {
      const entries = namespaces.get(namespace);
      return Promise.resolve(
        ok({ entries: entries === undefined ? [] : [...entries.values()], unreadable: [] })
      );
    },

    filter(namespace: string, pattern: string) {
      const entries = namespaces.get(namespace);
      if (entries === undefined) {
        return Promise.resolve(ok({ entries: [], unreadable: [] }));
      }

      const matches = createGlobMatcher(pattern);
      const result: CacheEntry[] = [];
      for (const [key, entry] of entries) {
        if (matches(key)) {
          result.push(entry);
        }
      }
      return Promise.resolve(ok({ entries: result, unreadable: [] }));
    },

    stats(): Promise<CacheStats> {
      let size = 0;
      for (const entries of namespaces.values()) {
        size += entries.size;
      }
      return Promise.resolve({ hits, misses, size });
    },
  };
};
