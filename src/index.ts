/**
 * Cloud inventory cache
 *
 * Cached provider resources and the security group read API built on them.
 */

export {
  createInventoryApp,
  type InventoryApp,
  type InventoryAppOptions,
} from './app.js';

export { parseEnv, createConfig, type AppConfig, type Env } from './infra/config/env.js';
export {
  createLogger,
  forComponent,
  type Component,
  type Logger,
  type LogLevel,
} from './infra/logger/index.js';

export * from './infra/cache/index.js';
export * from './modules/accounts/index.js';
export * from './modules/security-groups/index.js';

export type { AppError, InfraError } from './common/types/errors.js';
