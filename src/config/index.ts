/**
 * Configuration exports for the transcript archive
 */

export {
  ArchiveConfig,
  ArchiveConfigError,
  getArchiveConfig,
  normalizeSubdomain,
  DEFAULT_START_DATE,
  DEFAULT_END_DATE,
  PROGRESS_FILE_NAME,
  RESUME_POLICIES,
  type ArchiveSettings,
  type EnvironmentMap,
  type ResumePolicy,
} from './archive-config.js';
