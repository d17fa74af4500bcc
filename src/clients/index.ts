/**
 * Clients Exports
 *
 * Third-party API clients
 */

export * from './gong/index.js';
