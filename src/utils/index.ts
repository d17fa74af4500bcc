/**
 * Utility functions for the transcript archive
 */

// Re-export request scheduler and retry utilities
export * from './request-scheduler/index.js';

// Re-export date range utilities
export * from './date-range/index.js';
