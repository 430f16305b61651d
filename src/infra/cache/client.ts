/**
 * Cache store factory - creates and configures the store backend.
 */

import { createMemoryCacheStore, createRedisCacheStore } from './adapters/index.js';

import type { CacheStorePort } from './ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheBackend = 'memory' | 'redis';

export interface CacheConfig {
  /** Store backend to use */
  backend: CacheBackend;
  /** Redis connection URL (required if backend is 'redis') */
  redisUrl: string | undefined;
  /** Key prefix for Redis keys. Default: 'inventory' */
  keyPrefix: string;
}

export interface CacheClient {
  store: CacheStorePort;
  /** Release backend connections. */
  close(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Store Initialization
// ─────────────────────────────────────────────────────────────────────────────

export interface InitCacheStoreOptions {
  config: CacheConfig;
  logger: Logger;
}

/**
 * Initialize the cache store.
 */
export const initCacheStore = (options: InitCacheStoreOptions): CacheClient => {
  const { config, logger } = options;

  if (config.backend === 'redis') {
    if (config.redisUrl === undefined || config.redisUrl === '') {
      logger.warn('[Cache] Redis URL not configured, falling back to memory store');
    } else {
      logger.info(
        {
          keyPrefix: config.keyPrefix,
          redisUrl: config.redisUrl.replace(/\/\/.*@/, '//<redacted>@'),
        },
        '[Cache] Using Redis store'
      );
      const { store, client } = createRedisCacheStore({
        url: config.redisUrl,
        keyPrefix: config.keyPrefix,
      });
      return {
        store,
        async close() {
          await client.quit();
        },
      };
    }
  } else {
    logger.info('[Cache] Using in-memory store');
  }

  return {
    store: createMemoryCacheStore(),
    close: () => Promise.resolve(),
  };
};
