/**
 * Base Logger Configuration
 *
 * Pino logger setup with environment-based configuration for the transcript archive.
 * Emits structured JSON lines so download runs can be followed and grepped after the fact.
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

function isKnownEnvironment(value: string): value is keyof typeof LOG_LEVELS {
  return value in LOG_LEVELS;
}

/**
 * Get environment variables with defaults
 */
const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (isKnownEnvironment(NODE_ENV) ? LOG_LEVELS[NODE_ENV] : undefined) ||
  'info';

const loggerConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  base: { app: 'gong-transcript-archive' },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

/**
 * Base logger instance shared by the whole package.
 *
 * Component loggers are derived from it with createServiceLogger()
 * in logger-factory.ts.
 */
export const logger = pino(loggerConfig);

export type Logger = typeof logger;

export { LOG_LEVEL, NODE_ENV };
