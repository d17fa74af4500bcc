export {
  TranscriptArchive,
  RAW_JSON_DIR,
  TRANSCRIPTS_DIR,
  BY_DATE_DIR,
  CONSOLIDATED_FILE,
  type FormattedTranscriptPaths,
} from './transcript-archive.js';

export {
  extractCallDate,
  extractCallTime,
  extractDurationMinutes,
  extractParticipants,
  formatTimestamp,
  formatTranscriptText,
  makeSafeFilename,
  transcriptFileName,
  UNKNOWN_DATE,
  UNKNOWN_TIME,
} from './transcript-formatter.js';
