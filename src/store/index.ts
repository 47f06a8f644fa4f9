/**
 * Entity store and record construction.
 */

export * from './types.js';
export * from './KeyedLock.js';
export * from './EntityStore.js';
export * from './RecordFactory.js';
