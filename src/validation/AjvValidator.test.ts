/**
 * Tests for AjvValidator module.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { SchemaObject } from 'ajv';
import { AjvValidator, createValidator } from './AjvValidator.js';
import { CONTENT_ITEM_FIELDS_SCHEMA } from '../schema/contentItemFields.js';
import type { ContentItemFields } from '../store/types.js';

describe('AjvValidator', () => {
  let validator: AjvValidator;

  beforeEach(() => {
    validator = createValidator();
  });

  describe('validate', () => {
    const schema: SchemaObject = {
      type: 'object',
      required: ['title', 'kind'],
      properties: {
        kind: { type: 'string', enum: ['post', 'page'] },
        title: { type: 'string', minLength: 1 },
        slug: { type: 'string', pattern: '^/' },
        published: { type: 'string', format: 'date' },
      },
      additionalProperties: false,
    };

    it('validates conforming data', () => {
      const result = validator.validate({ kind: 'post', title: 'Hello' }, schema);

      expect(result).toEqual({ valid: true, errors: [] });
    });

    it('reports every failure with its path', () => {
      const result = validator.validate({ kind: 'draft', title: 7, extra: true }, schema);

      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => `${e.path} ${e.keyword}`).sort()).toEqual([
        '/ additionalProperties',
        '/kind enum',
        '/title type',
      ]);
    });

    it('formats error messages', () => {
      const result = validator.validate({ kind: 'draft', slug: 'no-slash', published: 'June' }, schema);
      const messages = result.errors.map((e) => e.message);

      expect(messages).toContain('Missing required property: title');
      expect(messages).toContain('Must be one of: post, page');
      expect(messages).toContain('Must match pattern: ^/');
      expect(messages).toContain('Invalid format: expected date');
    });
  });

  describe('check', () => {
    it('returns the typed data on success', () => {
      const validateFields = validator.compile<ContentItemFields>(CONTENT_ITEM_FIELDS_SCHEMA);
      const result = validator.check(validateFields, { filePath: '/a.md', date: '2022-01-01' });

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.data.filePath).toBe('/a.md');
      }
    });

    it('accepts date-times and nullable bodies', () => {
      const validateFields = validator.compile<ContentItemFields>(CONTENT_ITEM_FIELDS_SCHEMA);
      const result = validator.check(validateFields, {
        filePath: '/a.md',
        date: '2022-01-01T08:30:00Z',
        body: null,
        summary: 'Short',
      });

      expect(result.valid).toBe(true);
    });

    it('returns converted errors on failure', () => {
      const validateFields = validator.compile<ContentItemFields>(CONTENT_ITEM_FIELDS_SCHEMA);
      const result = validator.check(validateFields, { filePath: '', date: '2022-01-01', isPublished: 'yes' });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map((e) => e.path).sort()).toEqual(['/filePath', '/isPublished']);
      }
    });
  });
});
