/**
 * Application factory
 * This is the composition root where the cache store, accounts and the
 * security group provider are wired together
 */

import { err, ok, type Result } from 'neverthrow';

import { createConfig, parseEnv, type AppConfig } from './infra/config/env.js';
import { initCacheStore } from './infra/cache/index.js';
import { createLogger, forComponent } from './infra/logger/index.js';
import {
  loadAccountsFile,
  makeAccountResolver,
  checkUniqueAccounts,
  type Account,
  type AccountResolver,
  type AccountsFileError,
} from './modules/accounts/index.js';
import {
  createKeySchema,
  makeSecurityGroupProvider,
  makeSecurityGroupRepo,
  type KeySchema,
  type ReconstructionFailureReporter,
  type SecurityGroupProvider,
} from './modules/security-groups/index.js';

import type { CacheStorePort } from './infra/cache/index.js';
import type { Logger } from 'pino';

/**
 * Options for building the application.
 * Anything not supplied is derived from `config` (or from `env` when no
 * config is given).
 */
export interface InventoryAppOptions {
  config?: AppConfig;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Overrides the configured store backend, e.g. a store shared with a population job. */
  store?: CacheStorePort;
  /** Used when no accounts file is configured. */
  accounts?: readonly Account[];
  onReconstructionFailure?: ReconstructionFailureReporter;
}

export interface InventoryApp {
  config: AppConfig;
  logger: Logger;
  store: CacheStorePort;
  keys: KeySchema;
  accountResolver: AccountResolver;
  securityGroups: SecurityGroupProvider;
  /** Release the cache backend. */
  close(): Promise<void>;
}

const resolveAccounts = async (
  config: AppConfig,
  accounts: readonly Account[] | undefined,
  logger: Logger
): Promise<Result<readonly Account[], AccountsFileError>> => {
  if (config.accounts.file !== undefined) {
    logger.info({ file: config.accounts.file }, 'Loading accounts file');
    return loadAccountsFile(config.accounts.file);
  }
  if (accounts === undefined) {
    logger.warn('No accounts configured - cross-account references stay unresolved');
    return ok([]);
  }
  return checkUniqueAccounts(accounts);
};

/**
 * Creates the inventory application.
 *
 * Configuration parsing throws on invalid environment values; a broken
 * accounts list is returned as an error before any backend is opened.
 */
export const createInventoryApp = async (
  options: InventoryAppOptions = {}
): Promise<Result<InventoryApp, AccountsFileError>> => {
  const config = options.config ?? createConfig(parseEnv(options.env ?? process.env));

  const logger =
    options.logger ??
    createLogger({
      level: config.logger.level,
      pretty: config.logger.pretty,
    });

  const accounts = await resolveAccounts(config, options.accounts, logger);
  if (accounts.isErr()) {
    logger.error({ err: accounts.error }, 'Failed to load accounts');
    return err(accounts.error);
  }
  const accountResolver = makeAccountResolver(accounts.value);

  const cache =
    options.store !== undefined
      ? { store: options.store, close: () => Promise.resolve() }
      : initCacheStore({
          config: config.cache,
          logger: forComponent(logger, 'cache'),
        });

  const keys = createKeySchema({ prefix: config.keys.providerPrefix });

  const securityGroups = makeSecurityGroupProvider({
    repo: makeSecurityGroupRepo({ store: cache.store, keys }),
    keys,
    accountResolver,
    logger,
    onReconstructionFailure: options.onReconstructionFailure,
  });

  logger.info(
    { accounts: accountResolver.list().length, keyPrefix: keys.getPrefix() },
    'Inventory cache ready'
  );

  return ok({
    config,
    logger,
    store: cache.store,
    keys,
    accountResolver,
    securityGroups,
    close: () => cache.close(),
  });
};
