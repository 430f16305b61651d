/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Cache store
  CACHE_BACKEND: Type.Union([Type.Literal('memory'), Type.Literal('redis')], {
    default: 'memory',
  }),
  REDIS_URL: Type.Optional(Type.String()),
  CACHE_KEY_PREFIX: Type.String({ default: 'inventory', minLength: 1 }),

  // Security group keys
  PROVIDER_KEY_PREFIX: Type.String({ default: 'aws', minLength: 1 }),

  // Accounts
  ACCOUNTS_FILE: Type.Optional(Type.String({ minLength: 1 })),
});

export type Env = Static<typeof EnvSchema>;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const redisUrl = nonEmpty(env['REDIS_URL']);
  const accountsFile = nonEmpty(env['ACCOUNTS_FILE']);

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    CACHE_BACKEND:
      nonEmpty(env['CACHE_BACKEND'])?.toLowerCase() ?? (redisUrl !== undefined ? 'redis' : 'memory'),
    CACHE_KEY_PREFIX: nonEmpty(env['CACHE_KEY_PREFIX']) ?? 'inventory',
    PROVIDER_KEY_PREFIX: nonEmpty(env['PROVIDER_KEY_PREFIX']) ?? 'aws',
    ...(redisUrl !== undefined && { REDIS_URL: redisUrl }),
    ...(accountsFile !== undefined && { ACCOUNTS_FILE: accountsFile }),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  runtime: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  cache: {
    backend: env.CACHE_BACKEND,
    redisUrl: env.REDIS_URL,
    keyPrefix: env.CACHE_KEY_PREFIX,
  },
  keys: {
    /** Leading segment of every security group key */
    providerPrefix: env.PROVIDER_KEY_PREFIX,
  },
  accounts: {
    /** YAML file listing `{ name, accountId }` pairs */
    file: env.ACCOUNTS_FILE,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
