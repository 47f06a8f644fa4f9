/**
 * Tree building and sibling ordering.
 */

export * from './ordering.js';
export * from './TreeBuilder.js';
