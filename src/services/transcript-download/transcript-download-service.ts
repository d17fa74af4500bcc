/**
 * TranscriptDownloadService
 *
 * Drives a resumable download of every call and transcript in the
 * configured date range:
 *
 * 1. discovering - check the connection, load the progress snapshot and
 *    either reuse its discovered records or list calls again
 * 2. fetching    - fetch transcripts for ids not yet fetched, saving the
 *    snapshot after every successful batch
 * 3. persisting  - write raw JSON, formatted transcripts and the
 *    consolidated file, then delete the snapshot (kept when batches
 *    failed, so the next run fetches only those calls)
 *
 * Any failure (including cancellation) leaves the run in `failed` with
 * the snapshot saved, so the next run resumes where this one stopped.
 */

import { nanoid } from 'nanoid';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { ArchiveConfig } from '../../config/index.js';
import {
  GongClient,
  GongConnectionError,
  type BatchOutcome,
  type CallRecord,
  type CallTranscript,
  type FetchTranscriptsResult,
} from '../../clients/gong/index.js';
import {
  ProgressStore,
  missingIds,
  restrictToDiscovered,
  type ProgressSnapshot,
} from '../progress/index.js';
import { TranscriptArchive } from '../archive/index.js';
import { filterByTitle } from './title-filter.js';
import {
  DOWNLOAD_STATE_TRANSITIONS,
  DownloadInProgressError,
  type DownloadRunOptions,
  type DownloadState,
  type DownloadSummary,
} from './types.js';

/**
 * Dependencies for TranscriptDownloadService
 *
 * All dependencies are optional and will use defaults if not provided.
 */
export interface TranscriptDownloadServiceDependencies {
  /**
   * Configuration (date range, output path, resume policy)
   * If not provided, the singleton ArchiveConfig instance will be used
   */
  config?: ArchiveConfig;

  /**
   * Gong API client
   */
  client?: GongClient;

  /**
   * Snapshot persistence, defaults to the configured progress file
   */
  progressStore?: ProgressStore;

  /**
   * Artifact writer, defaults to the configured output path
   */
  archive?: TranscriptArchive;
}

const ACTIVE_STATES: ReadonlySet<DownloadState> = new Set(['discovering', 'fetching', 'persisting']);

/**
 * Keep the first record for each id
 */
function uniqueById(records: readonly CallRecord[]): CallRecord[] {
  const seen = new Set<string>();
  return records.filter((record) => {
    if (seen.has(record.id)) {
      return false;
    }
    seen.add(record.id);
    return true;
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * TranscriptDownloadService
 *
 * @example
 * ```typescript
 * const service = new TranscriptDownloadService();
 * const controller = new AbortController();
 * process.once('SIGINT', () => controller.abort());
 *
 * const summary = await service.run({ signal: controller.signal });
 * // { totalCalls: 250, downloadedTranscripts: 248, failedIds: [], ... }
 * ```
 */
export class TranscriptDownloadService {
  private readonly _config: ArchiveConfig;
  private readonly _client: GongClient;
  private readonly _progressStore: ProgressStore;
  private readonly _archive: TranscriptArchive;
  private readonly logger: ServiceLogger;
  private state: DownloadState = 'idle';

  constructor(dependencies: TranscriptDownloadServiceDependencies = {}) {
    this.logger = createServiceLogger('TranscriptDownloadService');
    this._config = dependencies.config ?? ArchiveConfig.getInstance();
    this._client = dependencies.client ?? new GongClient({ config: this._config });
    this._progressStore =
      dependencies.progressStore ?? new ProgressStore(this._config.progressFilePath);
    this._archive = dependencies.archive ?? new TranscriptArchive(this._config.outputPath);
  }

  protected get config(): ArchiveConfig {
    return this._config;
  }

  protected get client(): GongClient {
    return this._client;
  }

  protected get progressStore(): ProgressStore {
    return this._progressStore;
  }

  protected get archive(): TranscriptArchive {
    return this._archive;
  }

  getState(): DownloadState {
    return this.state;
  }

  private transition(
    to: DownloadState,
    runId: string,
    logger: ServiceLogger,
    onStateChange?: DownloadRunOptions['onStateChange']
  ): void {
    const from = this.state;
    if (!DOWNLOAD_STATE_TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid download state transition: ${from} -> ${to}`);
    }
    this.state = to;
    log.stateTransition(logger, from, to);
    onStateChange?.({ runId, from, to });
  }

  /**
   * Run a complete download
   *
   * @returns Summary of the run
   * @throws DownloadInProgressError if a run is already active
   * @throws GongConnectionError if the API rejects the connection check
   * @throws GongApiError / PaginationLimitError if discovery fails
   * @throws ProgressPersistenceError if a checkpoint cannot be written
   * @throws The signal's reason when cancelled
   */
  async run(options: DownloadRunOptions = {}): Promise<DownloadSummary> {
    if (ACTIVE_STATES.has(this.state)) {
      throw new DownloadInProgressError(this.state);
    }

    const runId = nanoid();
    const logger = this.logger.child({ runId });
    const { signal, onStateChange } = options;
    const range = this.config.dateRange;
    const resumePolicy = options.resumePolicy ?? this.config.settings.resumePolicy;
    const titleFilter = options.titleFilter ?? this.config.settings.titleFilter;
    const startedAt = new Date();

    let snapshot: ProgressSnapshot | undefined;

    this.transition('discovering', runId, logger, onStateChange);
    logger.info(
      { ...range, resumePolicy, titleFilter, outputPath: this.archive.outputPath },
      'Starting transcript download'
    );

    try {
      // Discovering
      if (!(await this.client.testConnection(range, signal))) {
        throw new GongConnectionError(this.client.baseUrl);
      }
      await this.archive.prepare();

      const loaded = await this.progressStore.load();
      const resumed = resumePolicy === 'reuse-cached' && loaded.discoveredRecords.length > 0;

      if (resumed) {
        snapshot = loaded;
        logger.info(
          { discovered: loaded.discoveredRecords.length, fetched: loaded.fetchedIds.size },
          'Resuming from saved snapshot, skipping discovery'
        );
      } else {
        const records = await this.client.listCallsExtensive(range, {
          signal,
          onProgress: (progress) => logger.debug(progress, 'Discovery progress'),
        });
        snapshot = restrictToDiscovered({
          discoveredRecords: uniqueById(records),
          fetchedIds: loaded.fetchedIds,
        });
        await this.progressStore.save(snapshot);
        logger.info(
          { discovered: snapshot.discoveredRecords.length, kept: snapshot.fetchedIds.size },
          'Discovery complete'
        );
      }

      const current: ProgressSnapshot = snapshot;
      const calls = filterByTitle(current.discoveredRecords, titleFilter);
      if (titleFilter) {
        logger.info(
          { titleFilter, matched: calls.length, discovered: current.discoveredRecords.length },
          'Applied title filter'
        );
      }

      // Fetching
      this.transition('fetching', runId, logger, onStateChange);
      const fetched = await this.fetchMissing(calls, current, logger, signal);
      const previouslyFetched = calls
        .map((call) => call.id)
        .filter((id) => current.fetchedIds.has(id) && !fetched.requested.has(id));
      const saved = await this.archive.loadTranscripts(previouslyFetched);

      const transcripts = new Map<string, CallTranscript>();
      for (const call of calls) {
        const transcript = fetched.result.transcripts.get(call.id) ?? saved.get(call.id);
        if (transcript) {
          transcripts.set(call.id, transcript);
        }
      }

      // Persisting
      this.transition('persisting', runId, logger, onStateChange);
      await this.persist(calls, transcripts);
      if (fetched.result.failedIds.size > 0) {
        await this.progressStore.save(current);
        logger.warn(
          { failed: fetched.result.failedIds.size, fetched: current.fetchedIds.size },
          'Kept snapshot, the next run fetches only the failed calls'
        );
      } else {
        await this.progressStore.clear();
      }

      this.transition('done', runId, logger, onStateChange);

      const finishedAt = new Date();
      const failedIds = calls
        .map((call) => call.id)
        .filter((id) => fetched.result.failedIds.has(id));
      const summary: DownloadSummary = {
        runId,
        totalCalls: calls.length,
        downloadedTranscripts: transcripts.size,
        failedIds,
        missingTranscriptIds: calls
          .map((call) => call.id)
          .filter((id) => !transcripts.has(id) && !fetched.result.failedIds.has(id)),
        successRate: calls.length > 0 ? transcripts.size / calls.length : 0,
        resumed,
        requestedIds: fetched.requested.size,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        outputDirectory: this.archive.outputPath,
      };

      logger.info(summary, 'Download completed');
      return summary;
    } catch (error) {
      this.transition('failed', runId, logger, onStateChange);
      logger.error(
        { error: errorMessage(error), aborted: signal?.aborted ?? false },
        'Download failed'
      );
      await this.saveAfterFailure(snapshot, logger);
      throw error;
    }
  }

  /**
   * Fetch transcripts for calls not yet fetched, checkpointing per batch
   *
   * After a successful batch, raw JSON is written for each of its calls and
   * every id in the batch is marked fetched, with or without a transcript.
   */
  private async fetchMissing(
    calls: readonly CallRecord[],
    snapshot: ProgressSnapshot,
    logger: ServiceLogger,
    signal?: AbortSignal
  ): Promise<{ result: FetchTranscriptsResult; requested: Set<string> }> {
    const missing = missingIds(snapshot, calls);
    const requested = new Set(missing);

    if (missing.length === 0) {
      logger.info({ calls: calls.length }, 'All transcripts already fetched, loading saved copies');
      return { result: { transcripts: new Map(), failedIds: new Set() }, requested };
    }

    logger.info(
      { missing: missing.length, alreadyFetched: calls.length - missing.length },
      'Fetching transcripts'
    );

    const recordsById = new Map(calls.map((call) => [call.id, call]));

    const checkpoint = async (outcome: BatchOutcome): Promise<void> => {
      if (outcome.failed) {
        return;
      }
      const byId = new Map(outcome.transcripts.map((transcript) => [transcript.callId, transcript]));
      for (const id of outcome.callIds) {
        const record = recordsById.get(id);
        if (record) {
          await this.archive.writeCall(record, byId.get(id) ?? null);
        }
        snapshot.fetchedIds.add(id);
      }
      await this.progressStore.save(snapshot);
      logger.info(
        {
          batch: outcome.batchIndex + 1,
          batchCount: outcome.batchCount,
          fetched: snapshot.fetchedIds.size,
        },
        'Checkpoint saved'
      );
    };

    const result = await this.client.fetchTranscripts(missing, this.config.dateRange, {
      signal,
      onBatch: checkpoint,
    });

    if (result.failedIds.size > 0) {
      logger.warn(
        { failed: result.failedIds.size },
        'Some transcript batches failed, they stay unfetched in the snapshot'
      );
    }

    return { result, requested };
  }

  /**
   * Write every artifact for the calls in scope
   */
  private async persist(
    calls: readonly CallRecord[],
    transcripts: ReadonlyMap<string, CallTranscript>
  ): Promise<void> {
    for (const call of calls) {
      const transcript = transcripts.get(call.id) ?? null;
      await this.archive.writeCall(call, transcript);
      if (transcript) {
        await this.archive.writeFormattedTranscript(call, transcript);
      }
    }
    await this.archive.writeConsolidated(calls, transcripts, this.config.dateRange);
  }

  /**
   * Best-effort save of the current snapshot; its own failure is only logged
   */
  private async saveAfterFailure(
    snapshot: ProgressSnapshot | undefined,
    logger: ServiceLogger
  ): Promise<void> {
    if (!snapshot || snapshot.discoveredRecords.length === 0) {
      return;
    }
    try {
      await this.progressStore.save(snapshot);
      logger.info(
        { discovered: snapshot.discoveredRecords.length, fetched: snapshot.fetchedIds.size },
        'Progress saved for resume'
      );
    } catch (saveError) {
      logger.error({ error: errorMessage(saveError) }, 'Could not save progress after failure');
    }
  }
}
