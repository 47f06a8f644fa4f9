/**
 * Type exports for the content index.
 */

export * from './common.js';
export * from './content.js';
