/**
 * Transcript download types
 */

import type { ResumePolicy } from '../../config/index.js';

/**
 * Lifecycle of a download run
 *
 * idle -> discovering -> fetching -> persisting -> done
 * discovering | fetching | persisting -> failed
 * done | failed -> discovering (next run)
 */
export type DownloadState =
  | 'idle'
  | 'discovering'
  | 'fetching'
  | 'persisting'
  | 'done'
  | 'failed';

export const DOWNLOAD_STATE_TRANSITIONS: Readonly<Record<DownloadState, readonly DownloadState[]>> = {
  idle: ['discovering'],
  discovering: ['fetching', 'failed'],
  fetching: ['persisting', 'failed'],
  persisting: ['done', 'failed'],
  done: ['discovering'],
  failed: ['discovering'],
};

export interface StateChange {
  runId: string;
  from: DownloadState;
  to: DownloadState;
}

export interface DownloadRunOptions {
  /**
   * Cancels the run between requests; the snapshot is saved before rejecting
   */
  signal?: AbortSignal;

  /**
   * Overrides TITLE_FILTER
   */
  titleFilter?: string;

  /**
   * Overrides RESUME_POLICY
   */
  resumePolicy?: ResumePolicy;

  onStateChange?: (change: StateChange) => void;
}

export interface DownloadSummary {
  runId: string;
  /** Calls in scope after title filtering */
  totalCalls: number;
  downloadedTranscripts: number;
  /** Calls whose transcript batch failed after retries */
  failedIds: string[];
  /** Calls fetched successfully that have no transcript upstream */
  missingTranscriptIds: string[];
  /** downloadedTranscripts / totalCalls, 0 when there are no calls */
  successRate: number;
  /** True when discovery was skipped in favour of the cached snapshot */
  resumed: boolean;
  /** Transcript requests made by this run (ids, not batches) */
  requestedIds: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  outputDirectory: string;
}

/**
 * Error thrown when run() is called while a run is active
 */
export class DownloadInProgressError extends Error {
  constructor(public readonly state: DownloadState) {
    super(`A download is already in progress (state: ${state})`);
    this.name = 'DownloadInProgressError';
  }
}
