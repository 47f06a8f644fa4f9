/**
 * RecordFactory — Builds ContentItems from parser output.
 *
 * The factory:
 * 1. Validates the raw fields against the content item fields schema
 * 2. Strips the content root from the file path
 * 3. Fills slug, title, type and taxonomies from the path when missing
 * 4. Normalizes the date to an ISO 8601 date-time
 */

import type { ValidateFunction } from 'ajv';
import { AjvValidator, createValidator } from '../validation/AjvValidator.js';
import { CONTENT_ITEM_FIELDS_SCHEMA } from '../schema/contentItemFields.js';
import {
  deriveIndexTitle,
  deriveSlug,
  deriveTitle,
  isIndexPath,
  removeRootPath,
  taxonomyRefs,
} from '../content/PathResolver.js';
import type { ValidationError } from '../types/common.js';
import type { ContentItem, ContentType, TaxonomyRef } from '../types/content.js';
import type { ContentItemFields, CreateItemResult, RecordFactoryConfig } from './types.js';

/**
 * Raised by createContentItemOrThrow when the fields do not validate.
 */
export class RecordValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ValidationError[] = []
  ) {
    super(message);
    this.name = 'RecordValidationError';
  }
}

function formatErrors(errors: ValidationError[]): string {
  return errors.map((error) => `${error.path}: ${error.message}`).join('; ');
}

function readPosition(metadata: Record<string, unknown>): number | null {
  const value = metadata.position;
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

/**
 * Index items are named after the taxonomy they describe.
 */
function indexTitle(taxonomies: TaxonomyRef[], filePath: string): string {
  const owner = taxonomies[taxonomies.length - 1];
  return owner !== undefined && owner.title !== '' ? owner.title : deriveIndexTitle(filePath);
}

export class RecordFactory {
  private readonly validator: AjvValidator;
  private readonly validateFields: ValidateFunction<ContentItemFields>;
  private readonly rootPath: string | null;

  constructor(validator: AjvValidator = createValidator(), config: RecordFactoryConfig = {}) {
    this.validator = validator;
    this.validateFields = validator.compile<ContentItemFields>(CONTENT_ITEM_FIELDS_SCHEMA);
    this.rootPath = config.rootPath ?? null;
  }

  /**
   * Build a content item from raw parser fields.
   *
   * `date` may be a Date or an ISO 8601 string.
   */
  createContentItem(fields: Record<string, unknown>): CreateItemResult {
    const input = fields.date instanceof Date ? { ...fields, date: fields.date.toISOString() } : fields;

    const result = this.validator.check(this.validateFields, input);
    if (!result.valid) {
      return {
        success: false,
        error: `Invalid content item fields: ${formatErrors(result.errors)}`,
        validation: { valid: false, errors: result.errors },
      };
    }

    const data = result.data;
    const timestamp = Date.parse(data.date);
    if (Number.isNaN(timestamp)) {
      return { success: false, error: `Invalid date: ${data.date}` };
    }

    const filePath = this.rootPath === null ? data.filePath : removeRootPath(data.filePath, this.rootPath);
    const taxonomies = taxonomyRefs(filePath);
    const type: ContentType = data.type ?? (isIndexPath(filePath) ? 'index' : 'post');
    const metadata = data.metadata ?? {};

    const item: ContentItem = {
      kind: 'content',
      type,
      slug: data.slug ?? deriveSlug(filePath),
      title: data.title ?? (type === 'index' ? indexTitle(taxonomies, filePath) : deriveTitle(filePath)),
      summary: data.summary ?? null,
      body: data.body ?? null,
      filePath,
      date: new Date(timestamp).toISOString(),
      isPublished: data.isPublished ?? false,
      metadata,
      position: readPosition(metadata),
      taxonomies,
      link: null,
    };

    return { success: true, item };
  }

  /**
   * Build a content item, throwing RecordValidationError on invalid fields.
   */
  createContentItemOrThrow(fields: Record<string, unknown>): ContentItem {
    const result = this.createContentItem(fields);
    if (!result.success) {
      throw new RecordValidationError(result.error, result.validation?.errors ?? []);
    }
    return result.item;
  }
}

/**
 * Create a RecordFactory with its own validator.
 */
export function createRecordFactory(config?: RecordFactoryConfig): RecordFactory {
  return new RecordFactory(createValidator(), config);
}
