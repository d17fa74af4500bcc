/**
 * Gong Transcript Archive
 *
 * Resumable, rate-limited bulk download of call metadata and transcripts
 * from the Gong v2 API.
 */

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export clients
export * from './clients/index.js';

// Export services
export * from './services/progress/index.js';
export * from './services/archive/index.js';
export * from './services/transcript-download/index.js';

export const version = '0.1.0';
