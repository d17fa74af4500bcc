/**
 * Download call transcripts for the configured date range
 *
 * Reads settings from the environment (see .env.example), downloads every
 * call and transcript, and writes them under OUTPUT_DIRECTORY/<start year>.
 * Interrupting with Ctrl+C saves progress; running again resumes.
 * A second Ctrl+C exits at once.
 *
 * Usage:
 *   npm run download
 *
 *   # or without npm
 *   node --env-file=.env --import tsx scripts/download-transcripts.ts
 */

import { ArchiveConfig, ArchiveConfigError } from '../src/config/index.js';
import { createServiceLogger } from '../src/logging/index.js';
import { TranscriptDownloadService } from '../src/services/transcript-download/index.js';
import type { DownloadSummary } from '../src/services/transcript-download/index.js';

const logger = createServiceLogger('DownloadTranscripts');

function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}h ${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}

function printSummary(summary: DownloadSummary): void {
  console.log('\n========================================');
  console.log('Download Summary');
  console.log('========================================');
  console.log(`Total calls found:       ${summary.totalCalls}`);
  console.log(`Transcripts downloaded:  ${summary.downloadedTranscripts}`);
  console.log(`Success rate:            ${(summary.successRate * 100).toFixed(1)}%`);
  console.log(`Failed (retry later):    ${summary.failedIds.length}`);
  console.log(`No transcript upstream:  ${summary.missingTranscriptIds.length}`);
  console.log(`Resumed from snapshot:   ${summary.resumed ? 'yes' : 'no'}`);
  console.log(`Duration:                ${formatDuration(summary.durationMs)}`);
  console.log(`Output directory:        ${summary.outputDirectory}`);
  console.log('========================================');
}

async function main(): Promise<void> {
  const config = ArchiveConfig.getInstance();
  logger.info(config.toLogContext(), 'Loaded configuration');

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, 'Interrupted again, exiting without saving');
      process.exit(130);
    }
    logger.warn(
      { signal },
      'Stopping, progress will be saved. Interrupt again to exit immediately'
    );
    controller.abort(new Error(`Interrupted by ${signal}`));
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  try {
    const service = new TranscriptDownloadService({ config });
    const summary = await service.run({ signal: controller.signal });
    printSummary(summary);

    if (summary.failedIds.length > 0) {
      console.log(
        `\n${summary.failedIds.length} calls could not be fetched. Run again to retry them.`
      );
    }
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ArchiveConfigError) {
    console.error(`\n❌ ${error.message}`);
  } else {
    logger.error(
      { error: error instanceof Error ? { name: error.name, message: error.message } : String(error) },
      'Download failed, rerun to resume'
    );
    console.error('\n❌ Download failed:', error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
});
