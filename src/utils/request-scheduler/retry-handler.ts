/**
 * RetryHandler
 *
 * Retry logic with exponential backoff for a single HTTP call.
 *
 * Failure classes:
 * - Transport errors (connection refused/reset, timeout): transient, retried with backoff
 * - 429 Too Many Requests: transient, retried after `Retry-After` (or a fixed fallback),
 *   capped at `maxRateLimitWaitMs`
 * - Any other non-2xx status: fatal, thrown immediately as ApiError
 *
 * Waits between attempts end early when `signal` aborts; the signal's
 * reason is thrown.
 *
 * Each attempt goes through the RequestScheduler when one is given, so
 * retries obey the same spacing as first attempts.
 *
 * @example
 * ```typescript
 * const page = await withRetries(
 *   () => fetch(url, { headers }),
 *   (body) => CallsPageSchema.parse(body),
 *   { scheduler, maxAttempts: 3 }
 * );
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { RequestScheduler } from './request-scheduler.js';

export interface RetryOptions {
  /**
   * Attempt ceiling, first attempt included
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Backoff before the second attempt; doubles for each further attempt
   * @default 4000
   */
  baseDelayMs?: number;

  /**
   * Upper bound for a single backoff delay
   * @default 10000
   */
  maxDelayMs?: number;

  /**
   * Random jitter added to each backoff delay (0..jitterMs)
   * @default 200
   */
  jitterMs?: number;

  /**
   * Wait after a 429 response that carries no usable `Retry-After` header
   * @default 60000
   */
  rateLimitFallbackMs?: number;

  /**
   * Upper bound for a single wait after a 429 response, whatever `Retry-After` says
   * @default 300000
   */
  maxRateLimitWaitMs?: number;

  /**
   * Scheduler every attempt is routed through
   */
  scheduler?: RequestScheduler;

  /**
   * Checked before every attempt and watched during every wait;
   * an aborted signal stops retrying
   */
  signal?: AbortSignal;

  /**
   * Optional name for logging purposes
   * @default 'RetryHandler'
   */
  name?: string;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  baseDelayMs: 4000,
  maxDelayMs: 10000,
  jitterMs: 200,
  rateLimitFallbackMs: 60000,
  maxRateLimitWaitMs: 300000,
} as const;

/**
 * Non-2xx response that is not worth retrying
 *
 * Preserves HTTP status code and response body for error handling
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly body?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * 429 response received on the last allowed attempt
 */
export class RateLimitedError extends ApiError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super(message, 429);
    this.name = 'RateLimitedError';
  }
}

/**
 * Transport failure that persisted through every attempt
 */
export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/**
 * Wait for `ms`, rejecting with the signal's reason as soon as it aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Backoff before the attempt following `attempt` (1-based)
 */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitterMs'> = {}
): number {
  const {
    baseDelayMs = DEFAULT_RETRY_OPTIONS.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_OPTIONS.maxDelayMs,
    jitterMs = DEFAULT_RETRY_OPTIONS.jitterMs,
  } = options;

  const exponential = baseDelayMs * 2 ** (attempt - 1);
  const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
  return Math.min(maxDelayMs, exponential + jitter);
}

/**
 * Parse a `Retry-After` header value into milliseconds
 *
 * Accepts delta-seconds or an HTTP date.
 *
 * @returns Delay in milliseconds, or undefined when the header is absent or unusable
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now()
): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }

  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined;
  }

  const date = new Date(header);
  if (Number.isNaN(date.getTime())) {
    return undefined;
  }
  return Math.max(0, date.getTime() - now);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute an HTTP call with retry logic and exponential backoff
 *
 * @param call - Function that performs one request
 * @param parse - Validates the parsed JSON body of a 2xx response
 * @param options - Retry configuration options
 * @returns The parsed body
 * @throws ApiError for a non-retryable status
 * @throws RateLimitedError if the last attempt was rate limited
 * @throws NetworkError if every attempt failed at the transport level
 */
export async function withRetries<T>(
  call: () => Promise<Response>,
  parse: (body: unknown) => T,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_OPTIONS.maxAttempts,
    rateLimitFallbackMs = DEFAULT_RETRY_OPTIONS.rateLimitFallbackMs,
    maxRateLimitWaitMs = DEFAULT_RETRY_OPTIONS.maxRateLimitWaitMs,
    name = 'RetryHandler',
    scheduler,
    signal,
  } = options;

  const logger = createServiceLogger(name);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();

    let response: Response;

    try {
      log.methodEntry(logger, 'withRetries', { attempt, maxAttempts });
      response = scheduler ? await scheduler.schedule(call) : await call();
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      if (attempt >= maxAttempts) {
        logger.error(
          { attempt, maxAttempts, error: errorMessage(error) },
          'All retry attempts exhausted for network error'
        );
        throw new NetworkError(
          `Request failed after ${attempt} attempts: ${errorMessage(error)}`,
          attempt,
          { cause: error }
        );
      }

      const delay = computeBackoffDelay(attempt, options);
      logger.warn(
        { attempt, delay, error: errorMessage(error) },
        'Network error, retrying with backoff'
      );

      await sleep(delay, signal);
      continue;
    }

    if (response.ok) {
      log.methodExit(logger, 'withRetries', { attempt, status: response.status });
      return parse(await response.json());
    }

    const status = response.status;
    const bodyText = await response.text().catch(() => '');

    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'));

      if (attempt >= maxAttempts) {
        logger.error(
          { attempt, maxAttempts, retryAfterMs },
          'Still rate limited after all retry attempts'
        );
        throw new RateLimitedError(
          `HTTP 429 Too Many Requests after ${attempt} attempts`,
          retryAfterMs
        );
      }

      const delay = Math.min(retryAfterMs ?? rateLimitFallbackMs, maxRateLimitWaitMs);
      logger.warn(
        { attempt, maxAttempts, delay, hasRetryAfter: retryAfterMs !== undefined },
        'Rate limited, waiting before retrying'
      );

      await sleep(delay, signal);
      continue;
    }

    const error = new ApiError(
      `HTTP ${status} ${response.statusText}${bodyText ? `: ${bodyText}` : ''}`,
      status,
      bodyText
    );
    log.methodError(logger, 'withRetries', error, { attempt, status });
    throw error;
  }

  // maxAttempts < 1
  throw new Error(`Invalid retry configuration: maxAttempts=${maxAttempts}`);
}
