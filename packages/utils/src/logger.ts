import { pino } from 'pino';
import type { Logger, Level, LevelWithSilent } from 'pino';

export type { Logger, Level };

export type LogLevel = LevelWithSilent;

export type Environment = 'development' | 'production' | 'test';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export const DEFAULT_LOG_LEVELS: Record<Environment, LogLevel> = {
  development: 'debug',
  production: 'info',
  test: 'silent',
};

export interface LoggerConfig {
  /** Service name, attached to every line */
  service: string;
  /** Overrides LOG_LEVEL and the environment default */
  level?: LogLevel;
  /** Extra bindings for every line */
  base?: Record<string, string | number | boolean>;
}

export function isValidLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function resolveEnvironment(nodeEnv: string | undefined): Environment {
  if (nodeEnv === 'production' || nodeEnv === 'test') {
    return nodeEnv;
  }
  return 'development';
}

/**
 * Resolve the log level: LOG_LEVEL when valid, else the default for NODE_ENV
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const explicit = env.LOG_LEVEL;
  if (explicit && isValidLogLevel(explicit)) {
    return explicit;
  }
  return DEFAULT_LOG_LEVELS[resolveEnvironment(env.NODE_ENV)];
}

/**
 * Create a JSON logger for a service
 *
 * @example
 * const logger = createLogger({ service: 'engine' });
 * logger.info({ symbol: 'ACME' }, 'Market opened');
 */
export function createLogger(config: LoggerConfig): Logger {
  return pino({
    name: config.service,
    level: config.level ?? getLogLevel(),
    base: { service: config.service, ...config.base },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createChildLogger(
  parent: Logger,
  bindings: Record<string, string | number | boolean>
): Logger {
  return parent.child(bindings);
}
