/**
 * Gong API Client
 *
 * Lists calls and fetches transcripts from the Gong v2 API.
 *
 * Features:
 * - Cursor pagination over /v2/calls and /v2/calls/extensive
 * - Transcript retrieval in batches of up to 100 call ids
 * - Shared RequestScheduler so every request (retries included) obeys the rate limit
 * - Retry with backoff for transport errors and 429 responses
 * - Per-request timeout and caller-driven cancellation via AbortSignal
 */

import type { z } from 'zod';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { ArchiveConfig } from '../../config/index.js';
import {
  ApiError,
  RequestScheduler,
  withRetries,
  type RetryOptions,
} from '../../utils/request-scheduler/index.js';
import { toQueryWindow, type DateRange } from '../../utils/date-range/index.js';
import {
  CallRecordSchema,
  CallsPageSchema,
  EXTENSIVE_CONTENT_SELECTOR,
  ExtensiveCallsPageSchema,
  TranscriptsResponseSchema,
  type CallRecord,
  type CallTranscript,
  type ExtensiveCall,
  type RecordsInfo,
} from './types.js';

/**
 * Maximum number of call ids per transcript request
 */
export const TRANSCRIPT_BATCH_SIZE = 100;

/**
 * Error thrown when a Gong API request fails
 */
export class GongApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GongApiError';
  }
}

/**
 * Error thrown when the pre-flight connection check fails
 */
export class GongConnectionError extends Error {
  constructor(baseUrl: string) {
    super(
      `Could not connect to the Gong API at ${baseUrl}. ` +
        `Check GONG_ACCESS_KEY, GONG_ACCESS_KEY_SECRET and GONG_SUBDOMAIN.`
    );
    this.name = 'GongConnectionError';
  }
}

/**
 * Error thrown when listing needs more pages than allowed
 */
export class PaginationLimitError extends Error {
  constructor(public readonly maxPages: number) {
    super(`Call listing exceeded the limit of ${maxPages} pages`);
    this.name = 'PaginationLimitError';
  }
}

/**
 * Progress after each listed page
 */
export interface ListProgress {
  /** 1-based page number */
  page: number;
  /** Records accumulated so far */
  fetched: number;
  /** Total reported by the API */
  totalRecords: number;
}

export interface ListCallsOptions {
  onProgress?: (progress: ListProgress) => void;
  /**
   * Page ceiling; defaults to MAX_DISCOVERY_PAGES
   */
  maxPages?: number;
  signal?: AbortSignal;
}

/**
 * Result of one transcript batch, reported before the next batch starts
 */
export interface BatchOutcome {
  /** 0-based batch index */
  batchIndex: number;
  batchCount: number;
  callIds: string[];
  transcripts: CallTranscript[];
  /** True when the request failed after retries */
  failed: boolean;
  error?: Error;
}

export interface FetchTranscriptsOptions {
  /**
   * Called after every batch; a rejection stops fetching and propagates
   */
  onBatch?: (outcome: BatchOutcome) => void | Promise<void>;
  signal?: AbortSignal;
  /**
   * @default TRANSCRIPT_BATCH_SIZE
   */
  batchSize?: number;
}

export interface FetchTranscriptsResult {
  /** Transcripts keyed by call id */
  transcripts: Map<string, CallTranscript>;
  /** Ids whose batch failed; ids from successful batches without a transcript are in neither */
  failedIds: Set<string>;
}

export interface GongClientDependencies {
  /**
   * Configuration providing base URL, credentials and limits
   * If not provided, the singleton ArchiveConfig instance will be used
   */
  config?: ArchiveConfig;

  /**
   * Request scheduler for rate limiting
   * If not provided, one is created from API_RATE_LIMIT
   */
  requestScheduler?: RequestScheduler;

  /**
   * Backoff tuning; attempt ceiling defaults to MAX_RETRIES
   */
  retryOptions?: Pick<
    RetryOptions,
    'maxAttempts' | 'baseDelayMs' | 'maxDelayMs' | 'jitterMs' | 'rateLimitFallbackMs'
  >;
}

interface ApiRequest<T> {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string>;
  body?: unknown;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  signal?: AbortSignal;
  maxAttempts?: number;
}

interface Page {
  calls: CallRecord[];
  records: RecordsInfo;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Merge an extensive call into a single record: metadata fields plus the
 * parties, context, content and interaction blocks
 */
export function flattenExtensiveCall(call: ExtensiveCall): CallRecord {
  if (!call.metaData) {
    return CallRecordSchema.parse(call);
  }
  return CallRecordSchema.parse({
    ...call.metaData,
    parties: call.parties,
    context: call.context,
    content: call.content,
    interaction: call.interaction,
  });
}

/**
 * Split ids into consecutive, non-overlapping batches
 */
export function partitionIds(ids: readonly string[], batchSize: number): string[][] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`Batch size must be a positive integer, got ${batchSize}`);
  }
  const batches: string[][] = [];
  for (let i = 0; i < ids.length; i += batchSize) {
    batches.push(ids.slice(i, i + batchSize));
  }
  return batches;
}

/**
 * Gong API Client
 *
 * Uses singleton pattern for convenient default access.
 */
export class GongClient {
  private static instance: GongClient | null = null;

  private readonly config: ArchiveConfig;
  private readonly requestScheduler: RequestScheduler;
  private readonly retryOptions: NonNullable<GongClientDependencies['retryOptions']>;
  private readonly logger: ServiceLogger;

  constructor(dependencies: GongClientDependencies = {}) {
    this.logger = createServiceLogger('GongClient');
    this.config = dependencies.config ?? ArchiveConfig.getInstance();
    this.requestScheduler =
      dependencies.requestScheduler ??
      RequestScheduler.fromRate(this.config.settings.requestsPerSecond, 'GongScheduler');
    this.retryOptions = {
      maxAttempts: this.config.settings.maxAttempts,
      ...dependencies.retryOptions,
    };
  }

  /**
   * Get singleton instance of GongClient
   */
  static getInstance(): GongClient {
    if (!GongClient.instance) {
      GongClient.instance = new GongClient();
    }
    return GongClient.instance;
  }

  /**
   * Reset singleton instance (useful for testing)
   */
  static resetInstance(): void {
    GongClient.instance = null;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Perform one API request through the scheduler with retries
   *
   * The per-request timeout aborts a hung attempt, which then counts as
   * a transport failure. The caller's signal cancels for good.
   */
  private async request<T>(req: ApiRequest<T>): Promise<T> {
    const url = new URL(req.path, this.baseUrl);
    for (const [key, value] of Object.entries(req.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      Authorization: this.config.authHeader,
      Accept: 'application/json',
    };
    if (req.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    log.externalApiCall(this.logger, 'Gong', req.path, { method: req.method });

    return withRetries(
      () => {
        const timeout = AbortSignal.timeout(this.config.settings.timeoutMs);
        return fetch(url, {
          method: req.method,
          headers,
          body: req.body === undefined ? undefined : JSON.stringify(req.body),
          signal: req.signal ? AbortSignal.any([req.signal, timeout]) : timeout,
        });
      },
      (body) => req.schema.parse(body),
      {
        ...this.retryOptions,
        ...(req.maxAttempts !== undefined && { maxAttempts: req.maxAttempts }),
        scheduler: this.requestScheduler,
        signal: req.signal,
        name: 'GongClient',
      }
    );
  }

  /**
   * Wrap a request failure; an abort is passed through untouched
   */
  private wrapError(operation: string, error: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted || error instanceof PaginationLimitError) {
      return error;
    }
    const cause = toError(error);
    const statusCode = error instanceof ApiError ? error.statusCode : undefined;
    return new GongApiError(`${operation} failed: ${cause.message}`, statusCode, { cause });
  }

  /**
   * "No calls found" is reported as 404 by the listing and transcript endpoints
   */
  private isNoCallsFound(error: unknown): boolean {
    return error instanceof ApiError && error.statusCode === 404;
  }

  /**
   * Follow cursors until a page comes back without one
   */
  private async paginate(
    operation: string,
    fetchPage: (cursor: string | undefined) => Promise<Page>,
    options: ListCallsOptions
  ): Promise<CallRecord[]> {
    const maxPages = options.maxPages ?? this.config.settings.maxDiscoveryPages;
    const records: CallRecord[] = [];
    let cursor: string | undefined;
    let page = 0;

    log.methodEntry(this.logger, operation, { maxPages });

    do {
      options.signal?.throwIfAborted();
      if (page >= maxPages) {
        throw new PaginationLimitError(maxPages);
      }

      let result: Page;
      try {
        result = await fetchPage(cursor);
      } catch (error) {
        if (page === 0 && this.isNoCallsFound(error)) {
          this.logger.info({ operation }, 'No calls found in date range');
          break;
        }
        log.methodError(this.logger, operation, toError(error), { page: page + 1 });
        throw this.wrapError(operation, error, options.signal);
      }

      page++;
      records.push(...result.calls);
      options.onProgress?.({
        page,
        fetched: records.length,
        totalRecords: result.records.totalRecords,
      });
      this.logger.debug(
        { page, fetched: records.length, totalRecords: result.records.totalRecords },
        'Fetched page of calls'
      );

      cursor = result.records.cursor || undefined;
    } while (cursor);

    log.methodExit(this.logger, operation, { pages: page, calls: records.length });
    return records;
  }

  /**
   * List call metadata for a date range via GET /v2/calls
   *
   * @returns Every call in the range, in page order
   * @throws GongApiError if any page fails
   * @throws PaginationLimitError if more than maxPages pages are needed
   */
  async listCalls(range: DateRange, options: ListCallsOptions = {}): Promise<CallRecord[]> {
    const window = toQueryWindow(range);

    return this.paginate(
      'listCalls',
      (cursor) =>
        this.request({
          method: 'GET',
          path: '/v2/calls',
          query: cursor === undefined ? { ...window } : { ...window, cursor },
          schema: CallsPageSchema,
          signal: options.signal,
        }),
      options
    );
  }

  /**
   * List calls with parties and content via POST /v2/calls/extensive
   *
   * Each call is flattened into one record (see flattenExtensiveCall).
   *
   * @throws GongApiError if any page fails
   * @throws PaginationLimitError if more than maxPages pages are needed
   */
  async listCallsExtensive(
    range: DateRange,
    options: ListCallsOptions = {}
  ): Promise<CallRecord[]> {
    const window = toQueryWindow(range);

    return this.paginate(
      'listCallsExtensive',
      async (cursor) => {
        const page = await this.request({
          method: 'POST',
          path: '/v2/calls/extensive',
          body: {
            filter: window,
            contentSelector: EXTENSIVE_CONTENT_SELECTOR,
            ...(cursor !== undefined && { cursor }),
          },
          schema: ExtensiveCallsPageSchema,
          signal: options.signal,
        });
        return { records: page.records, calls: page.calls.map(flattenExtensiveCall) };
      },
      options
    );
  }

  /**
   * Fetch transcripts for the given call ids in batches
   *
   * A batch that fails after retries is logged and skipped; its ids are
   * reported in `failedIds`. Cancellation and onBatch failures propagate.
   */
  async fetchTranscripts(
    callIds: readonly string[],
    range: DateRange,
    options: FetchTranscriptsOptions = {}
  ): Promise<FetchTranscriptsResult> {
    const window = toQueryWindow(range);
    const batches = partitionIds(callIds, options.batchSize ?? TRANSCRIPT_BATCH_SIZE);
    const transcripts = new Map<string, CallTranscript>();
    const failedIds = new Set<string>();

    log.methodEntry(this.logger, 'fetchTranscripts', {
      callCount: callIds.length,
      batchCount: batches.length,
    });

    for (const [batchIndex, batch] of batches.entries()) {
      options.signal?.throwIfAborted();

      let outcome: BatchOutcome;
      try {
        const response = await this.request({
          method: 'POST',
          path: '/v2/calls/transcript',
          body: { filter: { ...window, callIds: batch } },
          schema: TranscriptsResponseSchema,
          signal: options.signal,
        });

        for (const transcript of response.callTranscripts) {
          transcripts.set(transcript.callId, transcript);
        }
        outcome = {
          batchIndex,
          batchCount: batches.length,
          callIds: batch,
          transcripts: response.callTranscripts,
          failed: false,
        };
        this.logger.info(
          {
            batch: batchIndex + 1,
            batchCount: batches.length,
            received: response.callTranscripts.length,
            requested: batch.length,
          },
          'Fetched transcript batch'
        );
      } catch (error) {
        if (options.signal?.aborted) {
          throw error;
        }

        if (this.isNoCallsFound(error)) {
          outcome = {
            batchIndex,
            batchCount: batches.length,
            callIds: batch,
            transcripts: [],
            failed: false,
          };
          this.logger.info(
            { batch: batchIndex + 1, batchCount: batches.length },
            'No transcripts available for batch'
          );
        } else {
          for (const id of batch) {
            failedIds.add(id);
          }
          outcome = {
            batchIndex,
            batchCount: batches.length,
            callIds: batch,
            transcripts: [],
            failed: true,
            error: toError(error),
          };
          this.logger.error(
            {
              batch: batchIndex + 1,
              batchCount: batches.length,
              firstCallId: batch[0],
              error: toError(error).message,
            },
            'Transcript batch failed, continuing with next batch'
          );
        }
      }

      await options.onBatch?.(outcome);
    }

    log.methodExit(this.logger, 'fetchTranscripts', {
      transcripts: transcripts.size,
      failed: failedIds.size,
    });

    return { transcripts, failedIds };
  }

  /**
   * Check credentials and reachability with a single listing request
   *
   * A 404 ("no calls found") still proves the credentials work.
   *
   * @returns true when the API accepted the request
   */
  async testConnection(range: DateRange, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.request({
        method: 'GET',
        path: '/v2/calls',
        query: { ...toQueryWindow(range) },
        schema: CallsPageSchema,
        signal,
        maxAttempts: 1,
      });
      this.logger.info({ baseUrl: this.baseUrl }, 'API connection successful');
      return true;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (this.isNoCallsFound(error)) {
        this.logger.info({ baseUrl: this.baseUrl }, 'API connection successful, no calls in range');
        return true;
      }
      this.logger.error(
        { baseUrl: this.baseUrl, error: toError(error).message },
        'API connection failed'
      );
      return false;
    }
  }
}
