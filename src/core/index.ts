/**
 * Core plumbing.
 */

export * from './events.js';
