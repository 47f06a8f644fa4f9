/**
 * Tests for PathResolver.
 */

import { describe, it, expect } from 'vitest';
import {
  categoryChain,
  deriveIndexTitle,
  deriveSlug,
  deriveTaxonomyName,
  deriveTitle,
  isIndexPath,
  isStaticAssetPath,
  removeRootPath,
  segmentSlug,
  slugifySegment,
  staticAssetsPath,
  taxonomyRefs,
  titleize,
} from './PathResolver.js';

describe('PathResolver', () => {
  describe('deriveSlug', () => {
    it('strips the extension and keeps separators', () => {
      expect(deriveSlug('/blog/art/3d/post.md')).toBe('/blog/art/3d/post');
    });

    it('slugifies every segment', () => {
      expect(deriveSlug('/blog/My new Project.md')).toBe('/blog/my-new-project');
      expect(deriveSlug('/Docs/Getting_Started/Hello, World!.md')).toBe('/docs/getting-started/hello-world');
    });

    it('drops accents', () => {
      expect(deriveSlug('/café/crème brûlée.md')).toBe('/cafe/creme-brulee');
    });

    it('keeps non-Latin letters', () => {
      expect(deriveSlug('/blog/日本語.md')).toBe('/blog/日本語');
      expect(deriveSlug('/Новости/Привет мир.md')).toBe('/новости/привет-мир');
    });

    it('gives distinct slugs to non-Latin siblings', () => {
      expect(deriveSlug('/blog/日本語.md')).not.toBe(deriveSlug('/blog/中文.md'));
      expect(deriveSlug('/blog/中文.md')).toBe('/blog/中文');
    });

    it('never drops a file name with nothing slug-able in it', () => {
      expect(deriveSlug('/blog/🎉.md')).toBe('/blog/u1f389');
      expect(deriveSlug('/blog/!!!.md')).toBe('/blog/u21-21-21');
    });

    it('always returns an absolute slug', () => {
      expect(deriveSlug('about.md')).toBe('/about');
      expect(deriveSlug('/')).toBe('/');
    });
  });

  describe('slugifySegment', () => {
    it('collapses separator runs', () => {
      expect(slugifySegment('  a -- b__c  ')).toBe('a-b-c');
    });

    it('returns an empty slug for punctuation only', () => {
      expect(slugifySegment('!!!')).toBe('');
    });

    it('keeps kana with voiced marks composed', () => {
      expect(slugifySegment('ごはん')).toBe('ごはん');
    });
  });

  describe('segmentSlug', () => {
    it('spells out segments that slugify to nothing', () => {
      expect(segmentSlug('🎉')).toBe('u1f389');
      expect(segmentSlug('My Post')).toBe('my-post');
    });

    it('keeps blank segments empty', () => {
      expect(segmentSlug('')).toBe('');
      expect(segmentSlug('  ')).toBe('');
    });
  });

  describe('deriveTitle', () => {
    it('capitalizes only the first word', () => {
      expect(deriveTitle('/blog/my-new-project.md')).toBe('My new project');
      expect(deriveTitle('/blog/art/3d/post-about-art.md')).toBe('Post about art');
    });

    it('keeps the capitalization of later words', () => {
      expect(deriveTitle('/blog/My new Project.md')).toBe('My new Project');
    });

    it('treats underscores as spaces', () => {
      expect(deriveTitle('/docs/install_on_macOS.md')).toBe('Install on macOS');
    });
  });

  describe('titleize', () => {
    it('does not keep dashed tokens together', () => {
      expect(titleize('2d 3D 4d-art: notes')).toBe('2d 3D 4d art: notes');
    });

    it('leaves later words untouched', () => {
      expect(titleize('Some Startup raises $500M for the Platform'))
        .toBe('Some Startup raises $500M for the Platform');
    });
  });

  describe('deriveIndexTitle', () => {
    it('drops the leading underscore', () => {
      expect(deriveIndexTitle('/_index.md')).toBe('Index');
      expect(deriveIndexTitle('/blog/__index.md')).toBe('Index');
    });
  });

  describe('deriveTaxonomyName', () => {
    it('capitalizes every word', () => {
      expect(deriveTaxonomyName('my-project')).toBe('My Project');
    });

    it('upper-cases tokens starting with a digit', () => {
      expect(deriveTaxonomyName('3d')).toBe('3D');
      expect(deriveTaxonomyName('3d-models')).toBe('3D Models');
    });

    it('splits mixed tokens on the dash before upper-casing', () => {
      expect(deriveTaxonomyName('4d-art')).toBe('4D Art');
    });
  });

  describe('categoryChain', () => {
    it('returns one descriptor per directory level', () => {
      expect(categoryChain('/blog/art/3d-models/post.md')).toEqual([
        { title: 'Blog', slug: '/blog' },
        { title: 'Art', slug: '/blog/art' },
        { title: '3D Models', slug: '/blog/art/3d-models' },
      ]);
    });

    it('returns a single level for a top-level category', () => {
      expect(categoryChain('/blog/post.md')).toEqual([{ title: 'Blog', slug: '/blog' }]);
    });

    it('returns the synthetic root for root files', () => {
      expect(categoryChain('/post.md')).toEqual([{ title: '', slug: '/' }]);
      expect(categoryChain('post.md')).toEqual([{ title: '', slug: '/' }]);
    });

    it('keeps directories named with emoji', () => {
      expect(categoryChain('/🎉/post.md')).toEqual([{ title: '🎉', slug: '/u1f389' }]);
    });

    it('slugifies directory names', () => {
      expect(categoryChain('/My Docs/post.md')).toEqual([{ title: 'My Docs', slug: '/my-docs' }]);
    });

    it('nests category slugs under the item slug', () => {
      const paths = [
        '/post.md',
        '/blog/post.md',
        '/blog/art/3d-models/post.md',
        '/Docs/Getting Started/v1.2/Intro Page.md',
        '/blog/日本語.md',
        '/🎉/!!!.md',
      ];

      for (const path of paths) {
        const chain = categoryChain(path);
        const last = chain[chain.length - 1];
        expect(last).toBeDefined();
        expect(deriveSlug(path).startsWith(deriveSlug(last?.slug ?? ''))).toBe(true);

        chain.slice(1).forEach((descriptor, index) => {
          expect(descriptor.slug.startsWith(`${chain[index]?.slug}/`)).toBe(true);
        });
      }
    });
  });

  describe('taxonomyRefs', () => {
    it('adds level and parents to each level', () => {
      expect(taxonomyRefs('/blog/art/post.md')).toEqual([
        { slug: '/blog', title: 'Blog', level: 2, parents: ['/'] },
        { slug: '/blog/art', title: 'Art', level: 3, parents: ['/', '/blog'] },
      ]);
    });

    it('returns the root taxonomy for root files', () => {
      expect(taxonomyRefs('/about.md')).toEqual([
        { slug: '/', title: '', level: 1, parents: [] },
      ]);
    });
  });

  describe('content root helpers', () => {
    const config = { rootPath: '/srv/content', staticAssetsFolderName: 'static' };

    it('removes the content root', () => {
      expect(removeRootPath('/srv/content/blog/post.md', '/srv/content')).toBe('/blog/post.md');
      expect(removeRootPath('/srv/content/blog/post.md', '/srv/content/')).toBe('/blog/post.md');
    });

    it('leaves paths outside the root alone', () => {
      expect(removeRootPath('/srv/contents/post.md', '/srv/content')).toBe('/srv/contents/post.md');
    });

    it('detects static assets', () => {
      expect(staticAssetsPath(config)).toBe('/srv/content/static');
      expect(isStaticAssetPath('/srv/content/static/logo.png', config)).toBe(true);
      expect(isStaticAssetPath('/srv/content/statical/post.md', config)).toBe(false);
      expect(isStaticAssetPath('/srv/content/blog/post.md', config)).toBe(false);
    });
  });

  describe('isIndexPath', () => {
    it('matches _index files in any folder', () => {
      expect(isIndexPath('/blog/_index.md')).toBe(true);
      expect(isIndexPath('/_INDEX.markdown')).toBe(true);
    });

    it('does not match other files', () => {
      expect(isIndexPath('/blog/index.md')).toBe(false);
      expect(isIndexPath('/_index/post.md')).toBe(false);
    });
  });
});
