/**
 * Transcript Archive
 *
 * Writes downloaded calls to the output directory and reads back
 * transcripts saved by earlier runs.
 *
 * Layout under the output path:
 *   raw_json/call_<id>.json         { call_metadata, transcript }
 *   raw_json/all_data.json          every call and transcript, plus download_info
 *   transcripts/<name>.txt          formatted transcript
 *   by_date/<YYYY-MM-DD>/<name>.txt same file, grouped by call date
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import {
  CallTranscriptSchema,
  type CallRecord,
  type CallTranscript,
} from '../../clients/gong/index.js';
import type { DateRange } from '../../utils/date-range/index.js';
import {
  extractCallDate,
  formatTranscriptText,
  makeSafeFilename,
  transcriptFileName,
} from './transcript-formatter.js';

export const RAW_JSON_DIR = 'raw_json';
export const TRANSCRIPTS_DIR = 'transcripts';
export const BY_DATE_DIR = 'by_date';
export const CONSOLIDATED_FILE = 'all_data.json';

const RawCallFileSchema = z.object({
  call_metadata: z.unknown(),
  transcript: z.unknown(),
});

/**
 * Paths written for one formatted transcript
 */
export interface FormattedTranscriptPaths {
  transcriptPath: string;
  byDatePath: string;
}

async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
}

export class TranscriptArchive {
  private readonly logger: ServiceLogger;

  /**
   * @param outputPath - Directory for this date range's artifacts
   */
  constructor(readonly outputPath: string) {
    this.logger = createServiceLogger('TranscriptArchive');
  }

  /**
   * Path of a call's raw JSON file
   */
  rawCallPath(callId: string): string {
    return path.join(this.outputPath, RAW_JSON_DIR, `${makeSafeFilename(`call_${callId}`)}.json`);
  }

  /**
   * Create the directory layout
   */
  async prepare(): Promise<void> {
    for (const dir of [RAW_JSON_DIR, TRANSCRIPTS_DIR, BY_DATE_DIR]) {
      await fs.mkdir(path.join(this.outputPath, dir), { recursive: true });
    }
    log.fileOperation(this.logger, 'prepare', this.outputPath);
  }

  /**
   * Write a call's metadata and transcript; a call without a transcript
   * is stored with an empty transcript object
   */
  async writeCall(record: CallRecord, transcript: CallTranscript | null): Promise<void> {
    const filePath = this.rawCallPath(record.id);
    await writeJson(filePath, {
      call_metadata: record,
      transcript: transcript ?? {},
    });
    log.fileOperation(this.logger, 'writeCall', filePath, { hasTranscript: transcript !== null });
  }

  /**
   * Read transcripts saved by earlier runs
   *
   * Files that are missing, unreadable or hold no transcript are skipped.
   *
   * @returns Transcripts keyed by call id
   */
  async loadTranscripts(callIds: Iterable<string>): Promise<Map<string, CallTranscript>> {
    const transcripts = new Map<string, CallTranscript>();
    let skipped = 0;

    for (const callId of callIds) {
      const filePath = this.rawCallPath(callId);
      try {
        const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
        const file = RawCallFileSchema.parse(raw);
        const transcript = CallTranscriptSchema.safeParse(file.transcript);
        if (transcript.success) {
          transcripts.set(callId, transcript.data);
        }
      } catch (error) {
        skipped++;
        this.logger.warn(
          { callId, error: error instanceof Error ? error.message : String(error) },
          'Could not load saved transcript'
        );
      }
    }

    this.logger.info({ loaded: transcripts.size, skipped }, 'Loaded saved transcripts');
    return transcripts;
  }

  /**
   * Write the formatted transcript to transcripts/ and by_date/<date>/
   */
  async writeFormattedTranscript(
    record: CallRecord,
    transcript: CallTranscript
  ): Promise<FormattedTranscriptPaths> {
    const text = formatTranscriptText(record, transcript);
    const fileName = `${transcriptFileName(record)}.txt`;
    const dateDir = path.join(this.outputPath, BY_DATE_DIR, extractCallDate(record));

    const transcriptPath = path.join(this.outputPath, TRANSCRIPTS_DIR, fileName);
    const byDatePath = path.join(dateDir, fileName);

    await fs.writeFile(transcriptPath, text, 'utf8');
    await fs.mkdir(dateDir, { recursive: true });
    await fs.writeFile(byDatePath, text, 'utf8');

    return { transcriptPath, byDatePath };
  }

  /**
   * Write every call and transcript into a single file
   *
   * @returns Path of the consolidated file
   */
  async writeConsolidated(
    records: readonly CallRecord[],
    transcripts: ReadonlyMap<string, CallTranscript>,
    range: DateRange
  ): Promise<string> {
    const filePath = path.join(this.outputPath, RAW_JSON_DIR, CONSOLIDATED_FILE);

    await writeJson(filePath, {
      calls: records,
      transcripts: Object.fromEntries(transcripts),
      download_info: {
        date_range: `${range.startDate} to ${range.endDate}`,
        downloaded_at: new Date().toISOString(),
        total_calls: records.length,
        total_transcripts: transcripts.size,
      },
    });

    log.fileOperation(this.logger, 'writeConsolidated', filePath, {
      calls: records.length,
      transcripts: transcripts.size,
    });
    return filePath;
  }
}
