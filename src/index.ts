/**
 * chatgpt-export-cleaner
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './errors.js';
export * from './config/index.js';
export * from './ingest/chatgpt/index.js';
export * from './normalize/text.js';
export * from './normalize/pairs.js';
export * from './normalize/chatgpt.js';
export * from './export/markdown.js';
export * from './pipeline/clean.js';
export { getLogger, createLogger } from './utils/logger.js';
export { version } from './version.js';
