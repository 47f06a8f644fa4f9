/**
 * JSON Schema for the fields a markdown parser hands to RecordFactory.
 */

import type { SchemaObject } from 'ajv';

export const CONTENT_ITEM_FIELDS_SCHEMA_ID = 'https://markdown-content-index.dev/schema/content-item-fields.schema.json';

export const CONTENT_ITEM_FIELDS_SCHEMA: SchemaObject = {
  $id: CONTENT_ITEM_FIELDS_SCHEMA_ID,
  type: 'object',
  required: ['filePath', 'date'],
  properties: {
    type: { type: 'string', enum: ['post', 'page', 'index'] },
    title: { type: 'string', minLength: 1 },
    summary: { type: ['string', 'null'] },
    body: { type: ['string', 'null'] },
    slug: { type: 'string', pattern: '^/' },
    date: {
      type: 'string',
      anyOf: [
        { type: 'string', format: 'date-time' },
        { type: 'string', format: 'date' },
      ],
    },
    filePath: { type: 'string', minLength: 1 },
    isPublished: { type: 'boolean' },
    metadata: { type: 'object' },
  },
  additionalProperties: false,
};
