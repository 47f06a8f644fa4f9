/**
 * Entity types for the content index.
 *
 * Content items and taxonomy nodes share one slug keyspace and are stored
 * side by side in the EntityStore. Cross-references between entities
 * (previous/next navigation, parents) are slugs, never embedded entities.
 */

/**
 * The root taxonomy slug. Every non-root taxonomy lists it first in `parents`.
 */
export const ROOT_SLUG = '/';

/**
 * Content item types. `index` items describe their owning taxonomy and are
 * never listed as one of its children.
 */
export type ContentType = 'post' | 'page' | 'index';

export type TaxonomyType = 'taxonomy' | 'post';

export type SortBy = 'title' | 'date' | 'slug';

export type SortOrder = 'asc' | 'desc';

export const SORT_BY_VALUES: readonly SortBy[] = ['title', 'date', 'slug'];

export const SORT_ORDER_VALUES: readonly SortOrder[] = ['asc', 'desc'];

/** Sort settings of a taxonomy no index item has configured */
export const DEFAULT_SORT: { readonly sortBy: SortBy; readonly sortOrder: SortOrder } = {
  sortBy: 'date',
  sortOrder: 'desc',
};

/**
 * Descriptor of one taxonomy in a content item's category chain.
 */
export interface TaxonomyRef {
  slug: string;
  title: string;
  /** Depth, root = 1 (always `parents.length + 1`) */
  level: number;
  /** Ancestor slugs, root first */
  parents: string[];
}

/**
 * A neighbour in the navigation sequence.
 */
export interface LinkRef {
  slug: string;
  title: string;
}

/**
 * Resolved position of a content item in the content tree.
 */
export interface NavigationLink {
  type: 'post';
  slug: string;
  title: string;
  level: number;
  parents: string[];
  /** Index in the flattened, depth-first content sequence */
  position: number;
  previous: LinkRef | null;
  next: LinkRef | null;
}

/**
 * A post or page derived from a markdown file.
 */
export interface ContentItem {
  kind: 'content';
  type: ContentType;
  slug: string;
  title: string;
  summary: string | null;
  /** Rendered body; null when embedded as a taxonomy child */
  body: string | null;
  filePath: string;
  /** ISO 8601 publication date */
  date: string;
  isPublished: boolean;
  metadata: Record<string, unknown>;
  /** Ordering hint among siblings */
  position: number | null;
  /** Category chain, root-most first */
  taxonomies: TaxonomyRef[];
  /** Attached by the navigation pass after a content tree rebuild */
  link: NavigationLink | null;
}

/**
 * A category in the content hierarchy.
 */
export interface TaxonomyNode {
  kind: 'taxonomy';
  type: TaxonomyType;
  slug: string;
  title: string;
  customType: string | null;
  level: number;
  parents: string[];
  children: TaxonomyChild[];
  /** The taxonomy's own descriptive content */
  index: ContentItem | null;
  sortBy: SortBy;
  sortOrder: SortOrder;
  position: number | null;
}

export type TaxonomyChild = TaxonomyNode | ContentItem;

export type Entity = ContentItem | TaxonomyNode;

export type EntityKind = Entity['kind'];

/**
 * Fields of a content item that may be rewritten in place.
 */
export type ContentItemField = Exclude<keyof ContentItem, 'kind' | 'slug'>;

export function isContentItem(entity: Entity | null | undefined): entity is ContentItem {
  return entity?.kind === 'content';
}

export function isTaxonomyNode(entity: Entity | null | undefined): entity is TaxonomyNode {
  return entity?.kind === 'taxonomy';
}

/**
 * Create an empty taxonomy node from a chain descriptor.
 */
export function createTaxonomyNode(ref: TaxonomyRef): TaxonomyNode {
  return {
    kind: 'taxonomy',
    type: 'taxonomy',
    slug: ref.slug,
    title: ref.title,
    customType: null,
    level: ref.level,
    parents: [...ref.parents],
    children: [],
    index: null,
    sortBy: DEFAULT_SORT.sortBy,
    sortOrder: DEFAULT_SORT.sortOrder,
    position: null,
  };
}

/**
 * Copy of a content item suitable for embedding in a taxonomy.
 */
export function withoutBody(item: ContentItem): ContentItem {
  return { ...item, body: null };
}
