/**
 * Validation module exports.
 */

export * from './AjvValidator.js';
