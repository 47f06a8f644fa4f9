/**
 * Memoized derived trees.
 */

export * from './types.js';
export * from './DerivedCache.js';
