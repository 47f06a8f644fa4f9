/**
 * PathResolver — Metadata derived from content file paths.
 *
 * Convention:
 * - Directories are taxonomies: `/blog/art/post.md` is filed under
 *   `/blog` and `/blog/art`
 * - The slug is the slugified path without extension: `/blog/art/post`
 * - Files directly under the root belong to the root taxonomy `/`
 *
 * All functions are pure.
 */

import { extname, join } from 'node:path';
import { ROOT_SLUG, type TaxonomyRef } from '../types/content.js';
import type { ContentPathsConfig } from '../config/types.js';

/**
 * One level of a path's category chain.
 */
export interface CategoryDescriptor {
  /** Readable taxonomy name (e.g., "3D Models") */
  title: string;
  /** Cumulative slug up to this level (e.g., "/blog/art/3d-models") */
  slug: string;
}

/**
 * File name (without extension) of a taxonomy's own descriptive page.
 */
export const INDEX_FILE_NAME = '_index';

/**
 * Slugify a single path segment.
 *
 * @param text - Segment text
 * @returns URL-safe slug (may be empty when nothing slug-able remains)
 */
export function slugifySegment(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')       // Drop Latin combining accents
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{M}\p{N}\s_-]/gu, '') // Remove punctuation and symbols
    .replace(/[\s_-]+/gu, '-')              // Separators become dashes
    .replace(/^-+|-+$/g, '')                // Trim leading/trailing dashes
    .normalize('NFC');
}

/**
 * Slug of one path segment. A segment with nothing slug-able in it (emoji,
 * punctuation) is spelled out as its code points, so it never disappears
 * from the path.
 *
 * @example
 * segmentSlug('日本語') // '日本語'
 * segmentSlug('🎉') // 'u1f389'
 */
export function segmentSlug(segment: string): string {
  const slug = slugifySegment(segment);
  if (slug !== '' || segment.trim() === '') {
    return slug;
  }
  return `u${Array.from(segment.trim(), (char) => (char.codePointAt(0) ?? 0).toString(16)).join('-')}`;
}

/**
 * Remove the extension of the final path segment.
 */
function stripExtension(path: string): string {
  const ext = extname(path);
  return ext ? path.slice(0, -ext.length) : path;
}

/**
 * Final path segment, without extension.
 */
function baseName(path: string): string {
  const segment = path.slice(path.lastIndexOf('/') + 1);
  return stripExtension(segment);
}

/**
 * Split a title source into words: dashes and underscores count as spaces.
 */
function titleWords(source: string): string[] {
  return source
    .trim()
    .replace(/-/g, ' ')
    .replace(/_/g, ' ')
    .split(' ');
}

/**
 * Upper-case the first character, lower-case the rest.
 */
function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Whether a path is a taxonomy's index file (`_index.md`).
 */
export function isIndexPath(path: string): boolean {
  return baseName(path).toLowerCase() === INDEX_FILE_NAME;
}

/**
 * Derive the slug of a content file.
 *
 * @example
 * deriveSlug('/blog/art/3d/post.md') // '/blog/art/3d/post'
 * deriveSlug('/blog/My new Project.md') // '/blog/my-new-project'
 */
export function deriveSlug(path: string): string {
  const segments = stripExtension(path)
    .split('/')
    .map(segmentSlug)
    .filter((segment) => segment.length > 0);

  return `/${segments.join('/')}`;
}

/**
 * Turn a source string into a post title. Only the first word is
 * capitalized; the others are kept verbatim so acronyms and product names
 * survive.
 *
 * @example
 * titleize('post-about-art') // 'Post about art'
 * titleize('My new Project') // 'My new Project'
 */
export function titleize(source: string): string {
  return titleWords(source)
    .map((word, index) => (index === 0 ? capitalize(word) : word))
    .join(' ');
}

/**
 * Derive a readable title from the file name of a path.
 *
 * @example
 * deriveTitle('/blog/my-new-project.md') // 'My new project'
 */
export function deriveTitle(path: string): string {
  return titleize(baseName(path));
}

/**
 * Default title of a taxonomy's `_index` file: the file name without its
 * leading underscores.
 *
 * @example
 * deriveIndexTitle('/_index.md') // 'Index'
 */
export function deriveIndexTitle(path: string): string {
  return titleize(baseName(path).replace(/^_+/, ''));
}

/**
 * Derive a taxonomy name from a directory segment. Every word is
 * capitalized, and words starting with a digit are upper-cased ("3d" → "3D").
 * Dashes are consumed as separators first, so "4d-art" becomes "4D Art".
 */
export function deriveTaxonomyName(segment: string): string {
  return titleWords(segment)
    .map(capitalize)
    .map((word) => (/^[0-9]/.test(word) ? word.toUpperCase() : word))
    .join(' ');
}

/**
 * Split the directory portion of a path into its category chain.
 *
 * Empty directory segments (from `//` or a leading slash) are skipped.
 *
 * @example
 * categoryChain('/blog/art/3d-models/post.md')
 * // [{ title: 'Blog', slug: '/blog' },
 * //  { title: 'Art', slug: '/blog/art' },
 * //  { title: '3D Models', slug: '/blog/art/3d-models' }]
 *
 * categoryChain('/post.md') // [{ title: '', slug: '/' }]
 */
export function categoryChain(path: string): CategoryDescriptor[] {
  const directory = path.slice(0, path.lastIndexOf('/') + 1);

  const segments = directory
    .split('/')
    .map((segment) => ({ segment, slug: segmentSlug(segment) }))
    .filter(({ slug }) => slug.length > 0);

  if (segments.length === 0) {
    return [{ title: '', slug: ROOT_SLUG }];
  }

  return segments.map(({ segment }, index) => ({
    title: deriveTaxonomyName(segment),
    slug: `/${segments.slice(0, index + 1).map((s) => s.slug).join('/')}`,
  }));
}

/**
 * Category chain of a path as taxonomy references (with level and parents).
 */
export function taxonomyRefs(path: string): TaxonomyRef[] {
  const chain = categoryChain(path);

  if (chain.length === 1 && chain[0]?.slug === ROOT_SLUG) {
    return [{ slug: ROOT_SLUG, title: '', level: 1, parents: [] }];
  }

  return chain.map((descriptor, index) => {
    const parents = [ROOT_SLUG, ...chain.slice(0, index).map((c) => c.slug)];
    return {
      slug: descriptor.slug,
      title: descriptor.title,
      level: parents.length + 1,
      parents,
    };
  });
}

/**
 * Make a path relative to the content root, keeping the leading slash.
 *
 * @example
 * removeRootPath('/srv/content/blog/post.md', '/srv/content') // '/blog/post.md'
 */
export function removeRootPath(path: string, rootPath: string): string {
  const root = rootPath.replace(/\/+$/, '');
  if (root === '' || (path !== root && !path.startsWith(`${root}/`))) {
    return path;
  }
  const relative = path.slice(root.length);
  return relative === '' ? '/' : relative;
}

/**
 * Absolute path of the static assets folder.
 */
export function staticAssetsPath(config: ContentPathsConfig): string {
  return join(config.rootPath, config.staticAssetsFolderName);
}

/**
 * Whether a path lives in the static assets folder (and is not content).
 */
export function isStaticAssetPath(path: string, config: ContentPathsConfig): boolean {
  const assets = staticAssetsPath(config);
  return path === assets || path.startsWith(`${assets}/`);
}
