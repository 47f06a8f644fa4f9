/**
 * Types for the ContentIndex facade.
 */

import type { TreeKind } from '../cache/types.js';
import type { ContentItem, ContentType, EntityKind } from '../types/content.js';
import type { ValidationResult } from '../types/common.js';

/**
 * Entity selection for listAll. `post` and `page` select content items of
 * that type.
 */
export type ListKind = 'all' | EntityKind | Exclude<ContentType, 'index'>;

/**
 * Events emitted by ContentIndex, keyed by name.
 */
export interface ContentIndexEvents {
  'entity:saved': { slug: string; kind: EntityKind; timestamp: string };
  'entity:deleted': { slug: string; timestamp: string };
  'tree:rebuilt': { kind: TreeKind; cacheName: string; timestamp: string };
}

/**
 * Outcome of ingesting one parsed file.
 */
export type IngestResult =
  | { status: 'saved'; item: ContentItem }
  | { status: 'skipped'; reason: string }
  | { status: 'invalid'; error: string; validation?: ValidationResult };
