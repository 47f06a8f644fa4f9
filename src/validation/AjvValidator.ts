/**
 * AjvValidator — Structural validation of incoming record fields.
 *
 * Ajv is configured once at construction time (formats, strictness).
 * Ajv errors are converted to the index's ValidationError format.
 */

import Ajv2020Module from 'ajv/dist/2020.js';
import addFormatsModule from 'ajv-formats';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import type { ValidationError, ValidationResult } from '../types/common.js';

// Both packages are CommonJS; under Node's ESM loader the default import is
// `module.exports`, which carries the real export on `.default`.
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

type Ajv2020Instance = InstanceType<typeof Ajv2020>;

/**
 * Result of validating data whose shape is known on success.
 */
export type CheckResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] };

/**
 * Convert an Ajv ErrorObject to our ValidationError format.
 */
function convertAjvError(error: ErrorObject): ValidationError {
  const path = error.instancePath || '/';
  let message = error.message ?? 'Validation failed';

  switch (error.keyword) {
    case 'required':
      if ('missingProperty' in error.params) {
        message = `Missing required property: ${String(error.params.missingProperty)}`;
      }
      break;
    case 'type':
      if ('type' in error.params) {
        message = `Expected type: ${String(error.params.type)}`;
      }
      break;
    case 'enum':
      if ('allowedValues' in error.params && Array.isArray(error.params.allowedValues)) {
        message = `Must be one of: ${error.params.allowedValues.join(', ')}`;
      }
      break;
    case 'additionalProperties':
      if ('additionalProperty' in error.params) {
        message = `Unknown property: ${String(error.params.additionalProperty)}`;
      }
      break;
    case 'format':
      if ('format' in error.params) {
        message = `Invalid format: expected ${String(error.params.format)}`;
      }
      break;
    case 'pattern':
      if ('pattern' in error.params) {
        message = `Must match pattern: ${String(error.params.pattern)}`;
      }
      break;
  }

  return {
    path,
    message,
    keyword: error.keyword,
    params: { ...error.params },
  };
}

/**
 * AjvValidator — Ajv-based structural validator.
 */
export class AjvValidator {
  private readonly ajv: Ajv2020Instance;

  /**
   * Ajv is configured here once; do not modify the instance afterwards.
   */
  constructor() {
    this.ajv = new Ajv2020({
      strict: true,
      allowUnionTypes: true,
      allErrors: true, // Report all errors, not just the first
    });
    addFormats(this.ajv);
  }

  /**
   * Compile a schema into a validate function typed by the caller.
   * Compiling the same schema object again returns the cached function.
   */
  compile<T>(schema: SchemaObject): ValidateFunction<T> {
    return this.ajv.compile<T>(schema);
  }

  /**
   * Run a compiled validate function and hand the data back typed on success.
   */
  check<T>(validateFn: ValidateFunction<T>, data: unknown): CheckResult<T> {
    if (validateFn(data)) {
      return { valid: true, data };
    }
    return { valid: false, errors: (validateFn.errors ?? []).map(convertAjvError) };
  }

  /**
   * Validate data against a schema.
   */
  validate(data: unknown, schema: SchemaObject): ValidationResult {
    const result = this.check(this.compile<unknown>(schema), data);
    return result.valid ? { valid: true, errors: [] } : { valid: false, errors: result.errors };
  }
}

/**
 * Create a new AjvValidator instance.
 */
export function createValidator(): AjvValidator {
  return new AjvValidator();
}
