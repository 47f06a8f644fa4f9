/**
 * DerivedCache — Memoized taxonomy and content trees.
 *
 * Each tree lives in a slot that is either empty or ready. Reading an empty
 * slot rebuilds the tree from a full EntityStore enumeration. Writes to the
 * store never invalidate a slot; callers invalidate after a batch of writes.
 *
 * Rebuilds are not serialized: two cold reads may both rebuild. Every slot
 * carries a generation counter, so a rebuild that started before an
 * invalidate still returns its tree but does not store it.
 */

import type { EntityStore } from '../store/EntityStore.js';
import type { TaxonomyNode } from '../types/content.js';
import { buildContentTree, buildTaxonomyTree, flattenContentItems } from '../tree/TreeBuilder.js';
import { TREE_KINDS, type CacheSlot, type DerivedCacheConfig, type TreeKind } from './types.js';

const LABELS: Record<TreeKind, string> = {
  'taxonomy-tree': 'Taxonomy tree',
  'content-tree': 'Content tree',
};

export class DerivedCache {
  readonly name: string;

  private readonly store: EntityStore;
  private readonly onRebuild: DerivedCacheConfig['onRebuild'];
  private slots: Record<TreeKind, CacheSlot> = {
    'taxonomy-tree': { state: 'empty' },
    'content-tree': { state: 'empty' },
  };
  private generations: Record<TreeKind, number> = {
    'taxonomy-tree': 0,
    'content-tree': 0,
  };

  constructor(store: EntityStore, config: DerivedCacheConfig = {}) {
    this.store = store;
    this.name = config.name ?? 'content-index';
    this.onRebuild = config.onRebuild;
  }

  /**
   * Return the cached tree, rebuilding it when the slot is empty.
   */
  async getOrBuild(kind: TreeKind): Promise<TaxonomyNode> {
    const slot = this.slots[kind];
    if (slot.state === 'ready') {
      return slot.tree;
    }

    const generation = this.generations[kind];
    const tree = await this.rebuild(kind);

    if (this.generations[kind] === generation) {
      this.slots[kind] = { state: 'ready', tree, builtAt: new Date().toISOString() };
    }
    return tree;
  }

  /**
   * Drop one slot. The next read rebuilds it.
   */
  invalidate(kind: TreeKind): void {
    this.generations[kind] += 1;
    this.slots[kind] = { state: 'empty' };
  }

  invalidateAll(): void {
    for (const kind of TREE_KINDS) {
      this.invalidate(kind);
    }
  }

  isCached(kind: TreeKind): boolean {
    return this.slots[kind].state === 'ready';
  }

  /**
   * When the cached tree was built, or null for an empty slot.
   */
  builtAt(kind: TreeKind): string | null {
    const slot = this.slots[kind];
    return slot.state === 'ready' ? slot.builtAt : null;
  }

  private async rebuild(kind: TreeKind): Promise<TaxonomyNode> {
    console.log(`Rebuilding ${LABELS[kind].toLowerCase()} (cache ${this.name})...`);

    const taxonomies = this.store.enumerate('taxonomy');
    let tree: TaxonomyNode;

    if (kind === 'taxonomy-tree') {
      tree = buildTaxonomyTree(taxonomies);
      console.log(`${LABELS[kind]} rebuilt: ${taxonomies.length} taxonomies`);
    } else {
      tree = buildContentTree(taxonomies);
      const items = flattenContentItems(tree);
      // Resolved links go back to the flat records so slug lookups see them.
      await Promise.all(items.map((item) => this.store.updateField(item.slug, 'link', item.link)));
      console.log(`${LABELS[kind]} rebuilt: ${items.length} items`);
    }

    this.onRebuild?.(kind, tree);
    return tree;
  }
}

/**
 * Create a DerivedCache over a store.
 */
export function createDerivedCache(store: EntityStore, config?: DerivedCacheConfig): DerivedCache {
  return new DerivedCache(store, config);
}
