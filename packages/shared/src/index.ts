/**
 * @preview-sync/shared
 *
 * Logging, configuration, errors, and the GitHub and git adapters used by
 * the preview-sync CLI.
 */

// Re-export logger
export * from './logger/index.ts';

// Re-export config validation
export * from './config/index.ts';

// Re-export error classes
export * from './errors/index.ts';

// Re-export GitHub module
export * from './github/index.ts';

// Re-export git remote module
export * from './git/index.ts';
