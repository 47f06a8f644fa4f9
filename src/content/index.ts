/**
 * Path-derived content metadata.
 */

export * from './PathResolver.js';
