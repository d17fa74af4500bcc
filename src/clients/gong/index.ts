/**
 * Gong API client exports
 */

export {
  GongClient,
  GongApiError,
  GongConnectionError,
  PaginationLimitError,
  TRANSCRIPT_BATCH_SIZE,
  flattenExtensiveCall,
  partitionIds,
  type BatchOutcome,
  type FetchTranscriptsOptions,
  type FetchTranscriptsResult,
  type GongClientDependencies,
  type ListCallsOptions,
  type ListProgress,
} from './gong-client.js';

export * from './types.js';
