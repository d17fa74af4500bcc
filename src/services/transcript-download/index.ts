export {
  TranscriptDownloadService,
  type TranscriptDownloadServiceDependencies,
} from './transcript-download-service.js';

export {
  DownloadInProgressError,
  DOWNLOAD_STATE_TRANSITIONS,
  type DownloadRunOptions,
  type DownloadState,
  type DownloadSummary,
  type StateChange,
} from './types.js';

export {
  filterByTitle,
  matchesTitleFilter,
  parseTitleFilter,
  type TitleMatcher,
} from './title-filter.js';
