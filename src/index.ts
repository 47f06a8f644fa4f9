/**
 * markdown-content-index — In-memory index of markdown content with
 * taxonomy and content trees.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Configuration
export * from './config/index.js';

// Path-derived metadata
export * from './content/index.js';

// Schemas and validation
export * from './schema/index.js';
export * from './validation/index.js';

// Entity store and record construction
export * from './store/index.js';

// Trees and their cache
export * from './tree/index.js';
export * from './cache/index.js';

// Events
export * from './core/index.js';

// Facade
export * from './service/index.js';
