import type { ValidDraft } from './ValidDraft.js';

/** Names of the built-in rules. Custom rules report their own names. */
export type BuiltInRule = 'required' | 'type' | 'minLength' | 'maxLength' | 'pattern' | 'unknownField';

/** A single rule violation for a specific field. */
export interface ValidationError {
  /** Name of the field that failed validation. */
  readonly field: string;
  /** Name of the rule that failed (a `BuiltInRule` or a custom rule name). */
  readonly rule: string;
  /** Human-readable error message. */
  readonly message: string;
  /** Rule parameters or details (e.g. `{ min: 8 }`). */
  readonly metadata?: Record<string, unknown>;
}

/** Result of validating a draft: a certified draft, or every violation found. */
export type ValidationResult =
  | { readonly isValid: true; readonly draft: ValidDraft }
  | { readonly isValid: false; readonly errors: readonly ValidationError[] };

/** Create a passing validation result. */
export function validResult(draft: ValidDraft): ValidationResult {
  return { isValid: true, draft };
}

/** Create a failing validation result with the given errors. */
export function invalidResult(errors: readonly ValidationError[]): ValidationResult {
  return { isValid: false, errors };
}

/** Group errors by field name, keeping their order within each field. */
export function errorsByField(errors: readonly ValidationError[]): ReadonlyMap<string, readonly ValidationError[]> {
  const grouped = new Map<string, ValidationError[]>();
  for (const error of errors) {
    const list = grouped.get(error.field) ?? [];
    list.push(error);
    grouped.set(error.field, list);
  }
  return grouped;
}
