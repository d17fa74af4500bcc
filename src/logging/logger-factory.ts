/**
 * Logger Factory
 *
 * Creates component-specific Pino child loggers with consistent patterns.
 * Provides utility functions for common logging scenarios.
 */

import type { Logger } from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Service logger type
 * A Pino logger bound to a component name
 */
export type ServiceLogger = Logger;

/**
 * Create a component-specific logger with structured context
 *
 * @param serviceName - Name of the component (e.g., 'GongClient', 'ProgressStore')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('GongClient');
 * logger.info('Listing calls');
 * // Output: {"level":"info","service":"GongClient","msg":"Listing calls"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Common logging patterns
 *
 * Keeps the log format uniform across the client, the stores and the orchestrator.
 */
export const LogPatterns = {
  /**
   * Log method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'listCalls', { startDate: '2024-01-01' });
   * // Output: {"level":"debug","service":"...","method":"listCalls","params":{"startDate":"2024-01-01"},"msg":"Entering listCalls"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log method exit (debug level)
   *
   * Keep `result` to a summary; never log whole transcripts.
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log method error (error level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodError(logger, 'fetchTranscripts', error, { batchIndex: 2 });
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: Error,
    context: Record<string, unknown> = {}
  ) => {
    logger.error(
      {
        method,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Log external API call (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.externalApiCall(logger, 'Gong', '/v2/calls/transcript', { batchSize: 100 });
   * ```
   */
  externalApiCall: (
    logger: ServiceLogger,
    api: string,
    endpoint: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ api, endpoint, params }, `External API call: ${api}`);
  },

  /**
   * Log file system operation (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.fileOperation(logger, 'write', '/out/2024/download_progress.json');
   * ```
   */
  fileOperation: (
    logger: ServiceLogger,
    operation: string,
    path: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ operation, path, params }, `File operation: ${operation}`);
  },

  /**
   * Log a state machine transition (info level)
   */
  stateTransition: (logger: ServiceLogger, from: string, to: string) => {
    logger.info({ from, to }, `State ${from} -> ${to}`);
  },
};

/**
 * Alias for LogPatterns for more concise usage
 *
 * @example
 * ```typescript
 * log.methodEntry(logger, 'myMethod', { param: 'value' });
 * log.methodExit(logger, 'myMethod');
 * ```
 */
export const log = LogPatterns;
