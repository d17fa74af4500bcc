/**
 * Logging Module
 *
 * Structured logging with Pino for every component of the archive.
 */

export { logger, LOG_LEVEL, NODE_ENV } from './logger.js';
export type { Logger } from './logger.js';
export { createServiceLogger, LogPatterns, log } from './logger-factory.js';
export type { ServiceLogger } from './logger-factory.js';
