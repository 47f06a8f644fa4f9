/**
 * EntityStore — Concurrent slug → entity map.
 *
 * This is the source of truth for content items and taxonomy nodes. Derived
 * trees are built from it by the DerivedCache.
 *
 * Concurrency:
 * - Reads are synchronous and never wait on writers
 * - Every write goes through a per-key transaction; transactions on the
 *   same slug are serialized, so concurrent appends to one taxonomy are
 *   never lost
 * - There is no cross-key transaction. A content item's own record and its
 *   taxonomies' children lists are separate updates, and a reader may see
 *   one before the other until the writer finishes
 * - A save that fails part way restores the item's record and the children
 *   lists it touched before rejecting
 */

import {
  createTaxonomyNode,
  isContentItem,
  isTaxonomyNode,
  withoutBody,
  DEFAULT_SORT,
  SORT_BY_VALUES,
  SORT_ORDER_VALUES,
  type ContentItem,
  type ContentItemField,
  type Entity,
  type EntityKind,
  type SortBy,
  type SortOrder,
  type TaxonomyNode,
  type TaxonomyRef,
} from '../types/content.js';
import { sortChildren } from '../tree/ordering.js';
import { KeyedLock } from './KeyedLock.js';
import type { EntityStoreConfig } from './types.js';

/**
 * Raised when a write would put an entity of one kind over an entity of
 * the other kind under the same slug.
 */
export class SlugConflictError extends Error {
  constructor(
    public readonly slug: string,
    public readonly existingKind: EntityKind,
    public readonly incomingKind: EntityKind
  ) {
    super(`Slug '${slug}' is already used by a ${existingKind} entity, cannot store a ${incomingKind}`);
    this.name = 'SlugConflictError';
  }
}

/**
 * Transaction body: receives the current entity (or null) and returns the
 * replacement (null removes the key).
 */
export type EntityTransaction = (current: Entity | null) => Entity | null | Promise<Entity | null>;

function readSortBy(metadata: Record<string, unknown>): SortBy | null {
  const value = metadata.sort_by;
  return SORT_BY_VALUES.find((candidate) => candidate === value) ?? null;
}

function readSortOrder(metadata: Record<string, unknown>): SortOrder | null {
  const value = metadata.sort_order;
  return SORT_ORDER_VALUES.find((candidate) => candidate === value) ?? null;
}

/**
 * EntityStore — In-memory store with atomic per-key updates.
 */
export class EntityStore {
  readonly name: string;

  private readonly entities: Map<string, Entity> = new Map();
  private readonly locks = new KeyedLock();

  constructor(config: EntityStoreConfig = {}) {
    this.name = config.name ?? 'content';
  }

  /**
   * Get an entity by slug.
   */
  get(slug: string): Entity | null {
    return this.entities.get(slug) ?? null;
  }

  /**
   * Get a content item by slug (null for unknown slugs and taxonomies).
   */
  getContentItem(slug: string): ContentItem | null {
    const entity = this.get(slug);
    return isContentItem(entity) ? entity : null;
  }

  /**
   * Get a taxonomy node by slug (null for unknown slugs and content items).
   */
  getTaxonomy(slug: string): TaxonomyNode | null {
    const entity = this.get(slug);
    return isTaxonomyNode(entity) ? entity : null;
  }

  /**
   * Enumerate entities, optionally of one kind.
   */
  enumerate(): Entity[];
  enumerate(kind: 'content'): ContentItem[];
  enumerate(kind: 'taxonomy'): TaxonomyNode[];
  enumerate(kind?: EntityKind): Entity[];
  enumerate(kind?: EntityKind): Entity[] {
    const all = Array.from(this.entities.values());
    return kind === undefined ? all : all.filter((entity) => entity.kind === kind);
  }

  /**
   * Number of stored entities.
   */
  size(): number {
    return this.entities.size;
  }

  /**
   * Run an atomic transaction on one slug.
   *
   * @returns The entity stored under the slug once the transaction is done
   */
  async transact(slug: string, transaction: EntityTransaction): Promise<Entity | null> {
    return this.locks.run(slug, async () => {
      const next = await transaction(this.get(slug));
      if (next === null) {
        this.entities.delete(slug);
      } else {
        this.entities.set(slug, next);
      }
      return next;
    });
  }

  /**
   * Save a content item: upsert its own record, then append it to every
   * taxonomy it declares. Index items are routed to saveIndexItem.
   *
   * Saving the same item again replaces the earlier copies.
   */
  async saveContentItem(item: ContentItem): Promise<ContentItem> {
    if (item.type === 'index') {
      await this.saveIndexItem(item);
      return item;
    }

    this.assertNoConflicts(item);
    const existing = new Set(item.taxonomies.map((ref) => ref.slug).filter((slug) => this.get(slug) !== null));

    const previous = await this.locks.run(item.slug, () => {
      const current = this.get(item.slug);
      if (isTaxonomyNode(current)) {
        throw new SlugConflictError(item.slug, 'taxonomy', 'content');
      }
      this.entities.set(item.slug, item);
      return current;
    });

    const results = await Promise.allSettled(item.taxonomies.map((ref) => this.appendToTaxonomy(ref, item)));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure !== undefined) {
      await this.undoSave(item, previous, existing);
      throw failure.reason;
    }

    return item;
  }

  /**
   * Merge an index item into the last taxonomy of its chain. The taxonomy
   * takes the item's title and position; the item is not added as a child.
   */
  async saveIndexItem(item: ContentItem): Promise<TaxonomyNode> {
    const ref = item.taxonomies[item.taxonomies.length - 1];
    if (ref === undefined) {
      throw new Error(`Index item ${item.slug} declares no taxonomy`);
    }

    const saved = await this.transact(ref.slug, (current) => {
      const node = this.taxonomyFor(ref, current);
      const sortBy = readSortBy(item.metadata) ?? node.sortBy;
      const sortOrder = readSortOrder(item.metadata) ?? node.sortOrder;

      return {
        ...node,
        index: item,
        title: item.title,
        position: item.position,
        sortBy,
        sortOrder,
        children: sortChildren(node.children, { sortBy, sortOrder }),
      };
    });

    if (!isTaxonomyNode(saved)) {
      throw new Error(`Taxonomy ${ref.slug} missing after index merge`);
    }
    return saved;
  }

  /**
   * Save any content item, dispatching on its type.
   */
  async save(item: ContentItem): Promise<void> {
    if (item.type === 'index') {
      await this.saveIndexItem(item);
    } else {
      await this.saveContentItem(item);
    }
  }

  /**
   * Atomically rewrite one field of a stored content item.
   *
   * @returns The updated item, or null when the slug is not a content item
   */
  async updateField<K extends ContentItemField>(
    slug: string,
    field: K,
    value: ContentItem[K]
  ): Promise<ContentItem | null> {
    const result = await this.transact(slug, (current) => {
      if (!isContentItem(current)) {
        return current;
      }
      const updated: ContentItem = { ...current, [field]: value };
      return updated;
    });

    return isContentItem(result) ? result : null;
  }

  /**
   * Delete an entity by slug. A deleted content item is also removed from
   * its taxonomies; deleting the slug of an index item clears it from the
   * taxonomy it describes.
   *
   * @returns Whether anything was removed
   */
  async delete(slug: string): Promise<boolean> {
    const removed = await this.locks.run(slug, () => {
      const current = this.get(slug);
      this.entities.delete(slug);
      return current;
    });

    if (isContentItem(removed)) {
      await Promise.all(removed.taxonomies.map((ref) => this.removeFromTaxonomy(ref.slug, slug)));
      return true;
    }

    if (removed !== null) {
      return true;
    }

    return this.clearIndexItem(slug);
  }

  /**
   * Remove every entity.
   */
  clear(): void {
    this.entities.clear();
  }

  /**
   * Existing taxonomy for a ref, or a new one built from it.
   */
  private taxonomyFor(ref: TaxonomyRef, current: Entity | null): TaxonomyNode {
    if (current === null) {
      return createTaxonomyNode(ref);
    }
    if (isContentItem(current)) {
      throw new SlugConflictError(ref.slug, 'content', 'taxonomy');
    }
    return current;
  }

  /**
   * Reject a save up front when one of its taxonomy slugs is taken by a
   * content item, or is the item's own slug.
   */
  private assertNoConflicts(item: ContentItem): void {
    for (const ref of item.taxonomies) {
      if (ref.slug === item.slug) {
        throw new SlugConflictError(item.slug, 'taxonomy', 'content');
      }
      if (isContentItem(this.get(ref.slug))) {
        throw new SlugConflictError(ref.slug, 'content', 'taxonomy');
      }
    }
  }

  /**
   * Put back what a failed save changed. Taxonomies the save created are
   * removed again if they are left empty.
   */
  private async undoSave(item: ContentItem, previous: ContentItem | null, existing: ReadonlySet<string>): Promise<void> {
    await Promise.all([
      this.transact(item.slug, (current) => (current === item ? previous : current)),
      ...item.taxonomies.map((ref) =>
        this.transact(ref.slug, (current) => {
          if (!isTaxonomyNode(current)) {
            return current;
          }
          const children = current.children.filter((child) => child.slug !== item.slug);
          if (previous !== null && previous.taxonomies.some((owner) => owner.slug === ref.slug)) {
            children.push(withoutBody(previous));
          }
          if (children.length === 0 && current.index === null && !existing.has(ref.slug)) {
            return null;
          }
          return { ...current, children: sortChildren(children, current) };
        })
      ),
    ]);
  }

  private async appendToTaxonomy(ref: TaxonomyRef, item: ContentItem): Promise<void> {
    await this.transact(ref.slug, (current) => {
      const node = this.taxonomyFor(ref, current);
      const children = node.children.filter((child) => child.slug !== item.slug);
      children.push(withoutBody(item));

      return { ...node, children: sortChildren(children, node) };
    });
  }

  private async removeFromTaxonomy(taxonomySlug: string, childSlug: string): Promise<void> {
    await this.transact(taxonomySlug, (current) => {
      if (!isTaxonomyNode(current)) {
        return current;
      }
      return {
        ...current,
        children: current.children.filter((child) => child.slug !== childSlug),
      };
    });
  }

  private async clearIndexItem(indexSlug: string): Promise<boolean> {
    const owners = this.enumerate('taxonomy').filter((node) => node.index?.slug === indexSlug);

    await Promise.all(
      owners.map((owner) =>
        this.transact(owner.slug, (current) => {
          if (!isTaxonomyNode(current) || current.index === null || current.index.slug !== indexSlug) {
            return current;
          }
          const owner = current.index.taxonomies[current.index.taxonomies.length - 1];
          return {
            ...current,
            title: owner?.title ?? current.title,
            index: null,
            position: null,
            ...DEFAULT_SORT,
            children: sortChildren(current.children, DEFAULT_SORT),
          };
        })
      )
    );

    return owners.length > 0;
  }
}

/**
 * Create a new EntityStore instance.
 */
export function createEntityStore(config?: EntityStoreConfig): EntityStore {
  return new EntityStore(config);
}
