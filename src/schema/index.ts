/**
 * JSON Schemas for incoming content.
 */

export * from './contentItemFields.js';
