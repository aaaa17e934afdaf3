/**
 * Base Logger Configuration
 *
 * Pino logger setup with environment-based configuration for bond-analytics-services.
 * Emits structured JSON suitable for production log pipelines.
 */

import pino from 'pino';

/**
 * Log level mapping by environment
 */
const LOG_LEVELS = {
  development: 'debug',
  production: 'info',
  test: 'silent',
} as const;

function isKnownEnvironment(env: string): env is keyof typeof LOG_LEVELS {
  return env in LOG_LEVELS;
}

/**
 * Get environment variables with defaults
 */
const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (isKnownEnvironment(NODE_ENV) ? LOG_LEVELS[NODE_ENV] : 'info');

/**
 * Base logger configuration
 */
const loggerConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

/**
 * Base logger instance
 *
 * Singleton shared by the whole library. Service-specific loggers are
 * created via createServiceLogger() in logger-factory.ts
 */
export const logger = pino(loggerConfig);

export type Logger = typeof logger;

export { LOG_LEVEL, NODE_ENV };
