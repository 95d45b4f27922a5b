import type { Draft } from '../model/Draft.js';
import type { ValidationError, ValidationResult } from '../model/ValidationResult.js';

/**
 * Port for the validation stage.
 *
 * Implementations must be pure: the same draft always yields the same result.
 * `SchemaValidator` is the built-in implementation.
 */
export interface DraftValidator {
  /** Run every rule of every field and collect all violations. */
  validate(draft: Draft): ValidationResult;
  /** Run the rules of a single field. */
  validateField(field: string, draft: Draft): readonly ValidationError[];
}
