/**
 * ContentIndex facade.
 */

export * from './types.js';
export * from './ContentIndex.js';
