/**
 * Pino loggers for the inventory cache.
 *
 * One root logger per process; each component logs through a child bound to
 * `{ component }` so cache and query lines can be told apart.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type Component = 'app' | 'cache' | 'security-groups';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  /** Human-readable output through pino-pretty. */
  pretty: boolean;
  /** Component bound to every line of the returned logger. */
  component?: Component;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  name: 'cloud-inventory-cache',
  pretty: false,
};

const prettyTransport: LoggerOptions['transport'] = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
};

/**
 * Create the root logger, or a component logger when `component` is set.
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const { level, name, pretty, component } = { ...DEFAULT_LOGGER_CONFIG, ...config };

  const logger = pinoLib({
    name,
    level,
    // A silent logger never writes, so skip spawning the transport worker.
    ...(pretty && level !== 'silent' && { transport: prettyTransport }),
  });

  return component === undefined ? logger : forComponent(logger, component);
};

/**
 * Bind a component name to an existing logger.
 */
export const forComponent = (parent: Logger, component: Component): Logger =>
  parent.child({ component });

export { type Logger } from 'pino';
