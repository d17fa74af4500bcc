/**
 * Request Scheduler and Retry Handler Module
 *
 * Provides rate limiting and retry logic for external API calls.
 */

export { RequestScheduler, DEFAULT_REQUESTS_PER_SECOND } from './request-scheduler.js';
export type { RequestSchedulerOptions, RequestSchedulerStats } from './request-scheduler.js';

export {
  withRetries,
  computeBackoffDelay,
  parseRetryAfter,
  ApiError,
  RateLimitedError,
  NetworkError,
  DEFAULT_RETRY_OPTIONS,
} from './retry-handler.js';
export type { RetryOptions } from './retry-handler.js';
