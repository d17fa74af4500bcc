/**
 * Progress Store
 *
 * Persists the resumable state of a download: the discovered call records
 * and the ids whose transcripts have been fetched. The snapshot is written
 * to a temp file and renamed into place, so a crash mid-write leaves the
 * previous snapshot intact.
 *
 * File format (JSON):
 * {
 *   "discovered_records": [ { "id": "...", ... } ],
 *   "fetched_ids": [ "..." ],
 *   "saved_at": "2024-01-01T00:00:00.000Z"
 * }
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { CallRecordSchema, type CallRecord } from '../../clients/gong/index.js';

/**
 * In-memory resume state
 *
 * Invariant: every id in fetchedIds belongs to a discovered record.
 */
export interface ProgressSnapshot {
  discoveredRecords: CallRecord[];
  fetchedIds: Set<string>;
}

const SnapshotFileSchema = z.object({
  discovered_records: z.array(CallRecordSchema),
  fetched_ids: z.array(z.string()),
  saved_at: z.string().optional(),
});

/**
 * Error thrown when the snapshot cannot be written or removed
 */
export class ProgressPersistenceError extends Error {
  constructor(
    public readonly operation: 'save' | 'clear',
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to ${operation} progress snapshot at ${filePath}${reason}`, options);
    this.name = 'ProgressPersistenceError';
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function emptySnapshot(): ProgressSnapshot {
  return { discoveredRecords: [], fetchedIds: new Set() };
}

/**
 * Ids of all discovered records, in discovery order
 */
export function discoveredIds(snapshot: ProgressSnapshot): string[] {
  return snapshot.discoveredRecords.map((record) => record.id);
}

/**
 * Ids still to fetch: discovered (or the given subset) minus fetched
 */
export function missingIds(
  snapshot: ProgressSnapshot,
  records: readonly CallRecord[] = snapshot.discoveredRecords
): string[] {
  return records.map((record) => record.id).filter((id) => !snapshot.fetchedIds.has(id));
}

/**
 * Drop fetched ids that no discovered record carries
 */
export function restrictToDiscovered(snapshot: ProgressSnapshot): ProgressSnapshot {
  const known = new Set(discoveredIds(snapshot));
  return {
    discoveredRecords: snapshot.discoveredRecords,
    fetchedIds: new Set([...snapshot.fetchedIds].filter((id) => known.has(id))),
  };
}

export class ProgressStore {
  private readonly logger: ServiceLogger;

  /**
   * @param filePath - Location of the snapshot file
   */
  constructor(readonly filePath: string) {
    this.logger = createServiceLogger('ProgressStore');
  }

  /**
   * Load the persisted snapshot
   *
   * A missing, unreadable or malformed file is treated as "no snapshot".
   *
   * @returns The snapshot, or an empty one
   */
  async load(): Promise<ProgressSnapshot> {
    log.methodEntry(this.logger, 'load', { filePath: this.filePath });

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug({ filePath: this.filePath }, 'No progress snapshot found');
      } else {
        this.logger.warn(
          { filePath: this.filePath, error: error instanceof Error ? error.message : String(error) },
          'Could not read progress snapshot, starting fresh'
        );
      }
      return emptySnapshot();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(
        { filePath: this.filePath, error: error instanceof Error ? error.message : String(error) },
        'Progress snapshot is not valid JSON, starting fresh'
      );
      return emptySnapshot();
    }

    const parsed = SnapshotFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        { filePath: this.filePath, issues: parsed.error.issues.slice(0, 5) },
        'Progress snapshot has an unexpected shape, starting fresh'
      );
      return emptySnapshot();
    }

    const loaded: ProgressSnapshot = {
      discoveredRecords: parsed.data.discovered_records,
      fetchedIds: new Set(parsed.data.fetched_ids),
    };
    const snapshot = restrictToDiscovered(loaded);

    const dropped = loaded.fetchedIds.size - snapshot.fetchedIds.size;
    if (dropped > 0) {
      this.logger.warn({ dropped }, 'Ignoring fetched ids that were never discovered');
    }

    log.methodExit(this.logger, 'load', {
      discovered: snapshot.discoveredRecords.length,
      fetched: snapshot.fetchedIds.size,
      savedAt: parsed.data.saved_at,
    });
    return snapshot;
  }

  /**
   * Persist the snapshot atomically, creating the directory if needed
   *
   * @throws ProgressPersistenceError if the file cannot be written
   */
  async save(snapshot: ProgressSnapshot): Promise<void> {
    const consistent = restrictToDiscovered(snapshot);
    const contents = {
      discovered_records: consistent.discoveredRecords,
      fetched_ids: [...consistent.fetchedIds],
      saved_at: new Date().toISOString(),
    };
    const tempFile = `${this.filePath}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempFile, JSON.stringify(contents, null, 2), 'utf8');
      await fs.rename(tempFile, this.filePath);
    } catch (error) {
      throw new ProgressPersistenceError('save', this.filePath, { cause: error });
    }

    log.fileOperation(this.logger, 'save', this.filePath, {
      discovered: contents.discovered_records.length,
      fetched: contents.fetched_ids.length,
    });
  }

  /**
   * Delete the snapshot; an absent file is not an error
   *
   * @throws ProgressPersistenceError if the file exists but cannot be removed
   */
  async clear(): Promise<void> {
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (error) {
      throw new ProgressPersistenceError('clear', this.filePath, { cause: error });
    }
    log.fileOperation(this.logger, 'clear', this.filePath);
  }
}
