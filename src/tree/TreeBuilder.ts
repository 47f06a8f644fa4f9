/**
 * TreeBuilder — Derives the taxonomy tree and the content tree from the
 * complete set of taxonomy nodes.
 *
 * Both passes are pure: the same entity snapshot always produces the same
 * tree, whatever order the nodes are enumerated in.
 *
 * Nesting follows each node's `parents`. A node whose direct parent is
 * missing is attached to its nearest existing ancestor, and the root `/` is
 * synthesized when the store has none.
 */

import {
  createTaxonomyNode,
  isContentItem,
  isTaxonomyNode,
  withoutBody,
  ROOT_SLUG,
  type ContentItem,
  type LinkRef,
  type NavigationLink,
  type TaxonomyNode,
} from '../types/content.js';
import { compareTaxonomies, sortChildren } from './ordering.js';

/**
 * Taxonomy nodes grouped under the slug of the node they nest in.
 */
interface Hierarchy {
  root: TaxonomyNode;
  childrenOf: Map<string, TaxonomyNode[]>;
}

function syntheticRoot(): TaxonomyNode {
  return createTaxonomyNode({ slug: ROOT_SLUG, title: '', level: 1, parents: [] });
}

/**
 * Slug of the nearest ancestor present in the snapshot.
 */
function resolveParent(node: TaxonomyNode, known: Set<string>): string {
  for (let i = node.parents.length - 1; i >= 0; i--) {
    const candidate = node.parents[i];
    if (candidate !== undefined && candidate !== node.slug && known.has(candidate)) {
      return candidate;
    }
  }
  return ROOT_SLUG;
}

function groupHierarchy(taxonomies: TaxonomyNode[]): Hierarchy {
  const known = new Set(taxonomies.map((node) => node.slug));
  const root = taxonomies.find((node) => node.slug === ROOT_SLUG) ?? syntheticRoot();
  const childrenOf = new Map<string, TaxonomyNode[]>();

  for (const node of taxonomies) {
    if (node.slug === ROOT_SLUG) continue;

    const parent = resolveParent(node, known);
    const siblings = childrenOf.get(parent);
    if (siblings) {
      siblings.push(node);
    } else {
      childrenOf.set(parent, [node]);
    }
  }

  return { root, childrenOf };
}

function lastTaxonomySlug(item: ContentItem): string {
  return item.taxonomies[item.taxonomies.length - 1]?.slug ?? ROOT_SLUG;
}

/**
 * Build the taxonomy-only hierarchy. Content items are left out entirely and
 * index items keep no body.
 */
export function buildTaxonomyTree(taxonomies: TaxonomyNode[]): TaxonomyNode {
  const { root, childrenOf } = groupHierarchy(taxonomies);

  const build = (node: TaxonomyNode): TaxonomyNode => ({
    ...node,
    index: node.index === null ? null : withoutBody(node.index),
    children: (childrenOf.get(node.slug) ?? []).map(build).sort(compareTaxonomies),
  });

  return build(root);
}

/**
 * Build the full content hierarchy with navigation attached to every item.
 *
 * A node's children are its nested taxonomies followed by its direct content
 * items (those whose last declared taxonomy is the node itself).
 */
export function buildContentTree(taxonomies: TaxonomyNode[]): TaxonomyNode {
  const { root, childrenOf } = groupHierarchy(taxonomies);

  const build = (node: TaxonomyNode): TaxonomyNode => {
    const nested = (childrenOf.get(node.slug) ?? []).map(build);
    const items = node.children
      .filter(isContentItem)
      .filter((item) => lastTaxonomySlug(item) === node.slug)
      .map(withoutBody);

    return { ...node, children: sortChildren([...nested, ...items], node) };
  };

  const tree = build(root);
  const links = new Map(
    navigationPass(flattenContentItems(tree)).map(
      (item): [string, NavigationLink | null] => [item.slug, item.link]
    )
  );

  return attachLinks(tree, links);
}

function attachLinks(node: TaxonomyNode, links: Map<string, NavigationLink | null>): TaxonomyNode {
  return {
    ...node,
    children: node.children.map((child) =>
      isTaxonomyNode(child) ? attachLinks(child, links) : { ...child, link: links.get(child.slug) ?? null }
    ),
  };
}

/**
 * Content items of a tree in depth-first, sibling order.
 */
export function flattenContentItems(tree: TaxonomyNode): ContentItem[] {
  return tree.children.flatMap((child) => (isTaxonomyNode(child) ? flattenContentItems(child) : [child]));
}

function linkRef(item: ContentItem | undefined): LinkRef | null {
  return item === undefined ? null : { slug: item.slug, title: item.title };
}

/**
 * Assign every item its navigation link: its place in the sequence and its
 * neighbours (null at either end).
 */
export function navigationPass(items: ContentItem[]): ContentItem[] {
  return items.map((item, position) => {
    const owner = item.taxonomies[item.taxonomies.length - 1];
    const parents = owner === undefined ? [ROOT_SLUG] : [...owner.parents, owner.slug];

    const link: NavigationLink = {
      type: 'post',
      slug: item.slug,
      title: item.title,
      level: parents.length + 1,
      parents,
      position,
      previous: linkRef(items[position - 1]),
      next: linkRef(items[position + 1]),
    };

    return { ...item, link };
  });
}

/**
 * Find the taxonomy node with the given slug.
 */
export function findSubtree(tree: TaxonomyNode, slug: string): TaxonomyNode | null {
  if (tree.slug === slug) {
    return tree;
  }
  for (const child of tree.children) {
    if (isTaxonomyNode(child)) {
      const found = findSubtree(child, slug);
      if (found) return found;
    }
  }
  return null;
}
