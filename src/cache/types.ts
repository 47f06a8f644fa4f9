/**
 * Types for the derived tree cache.
 */

import type { TaxonomyNode } from '../types/content.js';

/**
 * The two memoized trees.
 */
export type TreeKind = 'taxonomy-tree' | 'content-tree';

export const TREE_KINDS: readonly TreeKind[] = ['taxonomy-tree', 'content-tree'];

/**
 * State of one cache slot.
 */
export type CacheSlot =
  | { state: 'empty' }
  | { state: 'ready'; tree: TaxonomyNode; builtAt: string };

/**
 * Configuration for DerivedCache.
 */
export interface DerivedCacheConfig {
  /** Cache identifier, used in log messages (default: 'content-index') */
  name?: string;
  /** Called after every rebuild, whether or not the result was stored */
  onRebuild?: (kind: TreeKind, tree: TaxonomyNode) => void;
}
