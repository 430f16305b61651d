/**
 * Cache Store Infrastructure
 *
 * A namespaced key/attribute store. Population jobs write whole entries;
 * query paths read and filter them by glob pattern.
 *
 * @example
 * ```typescript
 * import { initCacheStore } from '@/infra/cache/index.js';
 *
 * const { store } = initCacheStore({ config: config.cache, logger });
 *
 * await store.mergeAll('security-groups', entries);
 * const result = await store.filter('security-groups', 'aws:security-group:prod:*');
 * ```
 */

// Ports (interfaces)
export type {
  CacheStorePort,
  CacheEntry,
  CacheReadResult,
  CacheStats,
  UnreadableEntry,
} from './ports.js';
export { CacheError } from './ports.js';

// Glob matching
export { createGlobMatcher, globToRegExp } from './glob.js';

// Serialization
export { serializeEntry, deserializeEntry, deepFreeze } from './serialization.js';

// Adapters
export {
  createMemoryCacheStore,
  createRedisCacheStore,
  createRedisStoreFromCommands,
  toRedisStoreCommands,
  type RedisStoreCommands,
  type RedisStoreOptions,
} from './adapters/index.js';

// Client factory
export {
  initCacheStore,
  type CacheBackend,
  type CacheConfig,
  type CacheClient,
  type InitCacheStoreOptions,
} from './client.js';
