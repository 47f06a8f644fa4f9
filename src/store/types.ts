/**
 * Types for the entity store and record construction.
 *
 * The store holds already-constructed entities. Turning parser output into
 * a ContentItem (validation, path-derived defaults) is RecordFactory's job.
 */

import type { ValidationResult } from '../types/common.js';
import type { ContentItem, ContentType } from '../types/content.js';

/**
 * Configuration for EntityStore.
 */
export interface EntityStoreConfig {
  /** Store identifier, exposed as `EntityStore.name` (default: 'content') */
  name?: string;
}

/**
 * Fields a markdown parser produces for one file.
 *
 * Only `filePath` and `date` are required; slug, title and taxonomies are
 * derived from the path when missing.
 */
export interface ContentItemFields {
  type?: ContentType;
  title?: string;
  summary?: string | null;
  body?: string | null;
  slug?: string;
  /** ISO 8601 date or date-time */
  date: string;
  filePath: string;
  isPublished?: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Result of constructing a content item.
 */
export type CreateItemResult =
  | { success: true; item: ContentItem }
  | { success: false; error: string; validation?: ValidationResult };

/**
 * Configuration for RecordFactory.
 */
export interface RecordFactoryConfig {
  /** Content root stripped from incoming file paths */
  rootPath?: string;
}
