/**
 * ContentIndex — Entry point for parsers, watchers and serving code.
 *
 * Owns one EntityStore, its DerivedCache and a RecordFactory, all built from
 * one explicit ContentConfig. Inbound writes drop both cached trees once the
 * write settles, whether or not it succeeded; the trees are rebuilt lazily on the next read, so a burst
 * of writes costs a single rebuild.
 */

import { DerivedCache } from '../cache/DerivedCache.js';
import type { TreeKind } from '../cache/types.js';
import { SimpleEventEmitter, type EventHandler } from '../core/events.js';
import { isStaticAssetPath } from '../content/PathResolver.js';
import { DEFAULT_CONFIG, type ContentConfig } from '../config/types.js';
import { EntityStore } from '../store/EntityStore.js';
import { RecordFactory } from '../store/RecordFactory.js';
import { findSubtree } from '../tree/TreeBuilder.js';
import { ROOT_SLUG, type ContentItem, type Entity, type TaxonomyNode } from '../types/content.js';
import { createValidator, type AjvValidator } from '../validation/AjvValidator.js';
import type { ContentIndexEvents, IngestResult, ListKind } from './types.js';

export class ContentIndex {
  readonly config: ContentConfig;

  private readonly store: EntityStore;
  private readonly cache: DerivedCache;
  private readonly factory: RecordFactory;
  private readonly events = new SimpleEventEmitter<ContentIndexEvents>();

  constructor(config: ContentConfig = DEFAULT_CONFIG, validator: AjvValidator = createValidator()) {
    this.config = config;
    this.store = new EntityStore({ name: config.cacheName });
    this.cache = new DerivedCache(this.store, {
      name: config.indexCacheName,
      onRebuild: (kind) => {
        this.events.emit('tree:rebuilt', { kind, cacheName: config.indexCacheName, timestamp: now() });
      },
    });
    this.factory = new RecordFactory(validator, { rootPath: config.rootPath });
  }

  // --- Inbound ---

  /**
   * Save a constructed content item. Index items are merged into their
   * taxonomy.
   */
  async saveContentItem(item: ContentItem): Promise<ContentItem> {
    if (item.type === 'index') {
      await this.saveIndexItem(item);
      return item;
    }

    let saved: ContentItem;
    try {
      saved = await this.store.saveContentItem(item);
    } finally {
      this.cache.invalidateAll();
    }
    this.events.emit('entity:saved', { slug: saved.slug, kind: 'content', timestamp: now() });
    return saved;
  }

  /**
   * Merge an index item into the taxonomy it describes.
   */
  async saveIndexItem(item: ContentItem): Promise<TaxonomyNode> {
    let node: TaxonomyNode;
    try {
      node = await this.store.saveIndexItem(item);
    } finally {
      this.cache.invalidateAll();
    }
    this.events.emit('entity:saved', { slug: node.slug, kind: 'taxonomy', timestamp: now() });
    return node;
  }

  /**
   * Delete an entity. Deleting an unknown slug is a no-op.
   *
   * @returns Whether anything was removed
   */
  async deleteBySlug(slug: string): Promise<boolean> {
    const removed = await this.store.delete(slug);
    if (removed) {
      this.cache.invalidateAll();
      this.events.emit('entity:deleted', { slug, timestamp: now() });
    }
    return removed;
  }

  /**
   * Construct a content item from parser fields and save it. Files in the
   * static assets folder are skipped.
   */
  async ingest(fields: Record<string, unknown>): Promise<IngestResult> {
    const filePath = fields.filePath;
    if (typeof filePath === 'string' && isStaticAssetPath(filePath, this.config)) {
      return { status: 'skipped', reason: `${filePath} is a static asset` };
    }

    const result = this.factory.createContentItem(fields);
    if (!result.success) {
      return result.validation === undefined
        ? { status: 'invalid', error: result.error }
        : { status: 'invalid', error: result.error, validation: result.validation };
    }

    const item = await this.saveContentItem(result.item);
    return { status: 'saved', item };
  }

  /**
   * Remove every entity and drop both trees.
   */
  clear(): void {
    this.store.clear();
    this.cache.invalidateAll();
  }

  // --- Outbound ---

  getBySlug(slug: string): Entity | null {
    return this.store.get(slug);
  }

  async getTaxonomyTree(): Promise<TaxonomyNode> {
    return this.cache.getOrBuild('taxonomy-tree');
  }

  /**
   * The content tree, or the subtree rooted at `rootSlug` (null when no
   * taxonomy has that slug).
   */
  async getContentTree(rootSlug: string = ROOT_SLUG): Promise<TaxonomyNode | null> {
    const tree = await this.cache.getOrBuild('content-tree');
    return findSubtree(tree, rootSlug);
  }

  /**
   * List entities, ordered by slug.
   */
  listAll(kind: ListKind = 'all'): Entity[] {
    const entities =
      kind === 'all' || kind === 'content' || kind === 'taxonomy'
        ? this.store.enumerate(kind === 'all' ? undefined : kind)
        : this.store.enumerate('content').filter((item) => item.type === kind);

    return entities.sort((a, b) => (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0));
  }

  /**
   * Drop both cached trees.
   */
  refresh(): void {
    this.cache.invalidateAll();
  }

  isCached(kind: TreeKind): boolean {
    return this.cache.isCached(kind);
  }

  // --- Events ---

  on<K extends keyof ContentIndexEvents>(event: K, handler: EventHandler<ContentIndexEvents[K]>): () => void {
    return this.events.on(event, handler);
  }
}

function now(): string {
  return new Date().toISOString();
}

/**
 * Create a ContentIndex for a validated configuration.
 */
export function createContentIndex(config?: ContentConfig): ContentIndex {
  return new ContentIndex(config);
}
