/**
 * Cache store adapters - backend implementations.
 */

export { createMemoryCacheStore } from './memory-store.js';
export {
  createRedisCacheStore,
  createRedisStoreFromCommands,
  toRedisStoreCommands,
  type RedisStoreCommands,
  type RedisStoreOptions,
} from './redis-store.js';
