/**
 * Sibling ordering for taxonomy children.
 *
 * Nested taxonomies come first, ordered by position (positioned nodes
 * first), then title, then slug. Content items follow, ordered by the owning
 * taxonomy's sortBy/sortOrder with the slug as final tie-break. Insertion
 * order never matters.
 */

import {
  isTaxonomyNode,
  type ContentItem,
  type SortBy,
  type SortOrder,
  type TaxonomyChild,
  type TaxonomyNode,
} from '../types/content.js';

export interface SortSettings {
  sortBy: SortBy;
  sortOrder: SortOrder;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function dateValue(date: string): number {
  const value = Date.parse(date);
  return Number.isNaN(value) ? Number.NEGATIVE_INFINITY : value;
}

function comparePositions(a: number | null, b: number | null): number {
  if (a !== null && b !== null) return a - b;
  if (a !== null) return -1;
  if (b !== null) return 1;
  return 0;
}

/**
 * Comparator for content items under a taxonomy's sort settings.
 */
export function compareContentItems(settings: SortSettings): (a: ContentItem, b: ContentItem) => number {
  const direction = settings.sortOrder === 'asc' ? 1 : -1;

  return (a, b) => {
    let primary = 0;
    switch (settings.sortBy) {
      case 'date': {
        const da = dateValue(a.date);
        const db = dateValue(b.date);
        primary = da === db ? 0 : da < db ? -1 : 1;
        break;
      }
      case 'title':
        primary = a.title.localeCompare(b.title);
        break;
      case 'slug':
        primary = compareText(a.slug, b.slug);
        break;
    }

    if (primary !== 0) {
      return primary * direction;
    }
    return compareText(a.slug, b.slug);
  };
}

/**
 * Comparator for sibling taxonomies.
 */
export function compareTaxonomies(a: TaxonomyNode, b: TaxonomyNode): number {
  return (
    comparePositions(a.position, b.position) ||
    a.title.localeCompare(b.title) ||
    compareText(a.slug, b.slug)
  );
}

/**
 * Order a children list: taxonomies first, then content items.
 */
export function sortChildren(children: TaxonomyChild[], settings: SortSettings): TaxonomyChild[] {
  const taxonomies: TaxonomyNode[] = [];
  const items: ContentItem[] = [];

  for (const child of children) {
    if (isTaxonomyNode(child)) {
      taxonomies.push(child);
    } else {
      items.push(child);
    }
  }

  taxonomies.sort(compareTaxonomies);
  items.sort(compareContentItems(settings));

  return [...taxonomies, ...items];
}
