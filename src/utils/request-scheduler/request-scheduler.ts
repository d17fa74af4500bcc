/**
 * RequestScheduler
 *
 * Request scheduler that ensures minimum spacing between requests.
 * Uses promise chaining to serialize requests, so at most one scheduled
 * task is in flight at a time and tasks run in call order.
 *
 * @example
 * ```typescript
 * // Gong: 2.5 requests/second = 400ms spacing
 * const scheduler = RequestScheduler.fromRate(2.5, 'GongScheduler');
 *
 * const data = await scheduler.schedule(async () => {
 *   const response = await fetch('https://acme.api.gong.io/v2/calls');
 *   return response.json();
 * });
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';

/**
 * Default request rate in calls per second
 */
export const DEFAULT_REQUESTS_PER_SECOND = 2.5;

export interface RequestSchedulerOptions {
  /**
   * Minimum spacing between requests in milliseconds
   * @example 400 // 2.5 requests per second
   */
  minSpacingMs: number;

  /**
   * Optional name for logging purposes
   * @default 'RequestScheduler'
   */
  name?: string;
}

export interface RequestSchedulerStats {
  minSpacingMs: number;
  lastExecutionTime: number;
  timeUntilNextExecution: number;
  queueDepth: number;
}

export class RequestScheduler {
  private chain: Promise<unknown> = Promise.resolve();
  private lastExecutionTime = 0;
  private pending = 0;
  private readonly minSpacingMs: number;
  private readonly name: string;
  private readonly logger: ServiceLogger;

  /**
   * @param options - Configuration options or minimum spacing in milliseconds
   */
  constructor(options: RequestSchedulerOptions | number) {
    if (typeof options === 'number') {
      this.minSpacingMs = options;
      this.name = 'RequestScheduler';
    } else {
      this.minSpacingMs = options.minSpacingMs;
      this.name = options.name || 'RequestScheduler';
    }

    this.logger = createServiceLogger(this.name);
    this.logger.info(
      { minSpacingMs: this.minSpacingMs },
      'RequestScheduler initialized'
    );
  }

  /**
   * Create a scheduler from a calls-per-second rate
   *
   * @param requestsPerSecond - Allowed request rate, must be positive
   * @param name - Optional name for logging purposes
   * @throws Error if the rate is not a positive finite number
   */
  static fromRate(
    requestsPerSecond: number = DEFAULT_REQUESTS_PER_SECOND,
    name?: string
  ): RequestScheduler {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new Error(
        `Request rate must be a positive number, got ${requestsPerSecond}`
      );
    }
    return new RequestScheduler({
      minSpacingMs: 1000 / requestsPerSecond,
      name,
    });
  }

  /**
   * Wait for the next free slot
   *
   * Resolves once at least `minSpacingMs` has passed since the previous
   * granted slot. Concurrent callers queue and are granted in call order.
   */
  acquire(): Promise<void> {
    return this.schedule(async () => undefined);
  }

  /**
   * Schedule a task for execution with minimum spacing
   *
   * Tasks are executed sequentially with at least `minSpacingMs` between them.
   * If called multiple times concurrently, tasks are queued and executed in order.
   * A rejected task rejects its own promise only; later tasks still run.
   *
   * @param task - Async function to execute
   * @returns Promise that resolves with the task result
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;

    const taskPromise = new Promise<T>((resolve, reject) => {
      // Chain to maintain order, but don't let errors break the chain
      this.chain = this.chain
        .then(async () => {
          const now = Date.now();
          const timeSinceLastExecution = now - this.lastExecutionTime;
          const waitTime = Math.max(0, this.minSpacingMs - timeSinceLastExecution);

          if (waitTime > 0) {
            this.logger.debug(
              { waitMs: waitTime, timeSinceLastMs: timeSinceLastExecution },
              'Waiting before executing request'
            );
            await this.sleep(waitTime);
          }

          try {
            log.methodEntry(this.logger, 'schedule', {
              waitedMs: waitTime,
            });

            const result = await task();

            log.methodExit(this.logger, 'schedule', {
              success: true,
            });

            resolve(result);
          } catch (error) {
            log.methodError(
              this.logger,
              'schedule',
              error instanceof Error ? error : new Error(String(error))
            );
            reject(error);
          } finally {
            this.lastExecutionTime = Date.now();
            this.pending--;
          }
        })
        .catch((error: unknown) => {
          // Errors in the chain setup itself, task errors are handled above
          reject(error);
        });
    });

    return taskPromise;
  }

  /**
   * Get the number of tasks that are queued or running
   */
  getQueueDepth(): number {
    return this.pending;
  }

  /**
   * Get the time until the next task can execute
   *
   * @returns Milliseconds until next execution, or 0 if ready now
   */
  getTimeUntilNextExecution(): number {
    const now = Date.now();
    const timeSinceLastExecution = now - this.lastExecutionTime;
    return Math.max(0, this.minSpacingMs - timeSinceLastExecution);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  getStats(): RequestSchedulerStats {
    return {
      minSpacingMs: this.minSpacingMs,
      lastExecutionTime: this.lastExecutionTime,
      timeUntilNextExecution: this.getTimeUntilNextExecution(),
      queueDepth: this.pending,
    };
  }
}
