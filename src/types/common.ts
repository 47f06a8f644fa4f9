/**
 * Common type definitions shared across the content index.
 */

/**
 * Validation error with JSON pointer path.
 */
export interface ValidationError {
  /** JSON pointer path to the error location (e.g., "/date") */
  path: string;
  /** Error message */
  message: string;
  /** Schema keyword that failed (e.g., "required", "type", "enum") */
  keyword: string;
  /** Additional parameters from the validation */
  params?: Record<string, unknown>;
}

/**
 * Result of structural validation via Ajv.
 */
export interface ValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** List of validation errors (empty if valid) */
  errors: ValidationError[];
}
