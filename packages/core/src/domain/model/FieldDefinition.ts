import type { Draft } from './Draft.js';

/** Supported field types for draft validation. */
export type FieldType = 'string' | 'number' | 'boolean' | 'date' | 'email' | 'custom';

/** Result returned by a custom field rule. */
export interface ValidationFieldResult {
  valid: boolean;
  message?: string;
  /** Additional structured data about the failure (e.g. the expected value). */
  metadata?: Record<string, unknown>;
}

/** What a rule sees besides the value under test. */
export interface RuleContext {
  /** Canonical name of the field being validated. */
  readonly field: string;
  /** The whole draft, for cross-field rules. */
  readonly draft: Draft;
}

/**
 * A named, pure predicate over a field's value.
 *
 * A rule that throws counts as failed: the validator reports a `ValidationError`
 * under the rule's name carrying the thrown message, and the run ends with
 * `ValidationFailed` instead of rejecting.
 */
export interface FieldRule {
  /** Rule name reported in `ValidationError.rule`. */
  readonly name: string;
  readonly validate: (value: unknown, context: RuleContext) => ValidationFieldResult;
}

/** Defines a single field of a form schema. */
export interface FieldDefinition {
  /** Canonical field name. */
  readonly name: string;
  /** Built-in type validation applied to this field's value. */
  readonly type: FieldType;
  /** When `true`, the field must be present and non-empty. */
  readonly required: boolean;
  /** Human-readable name used in messages. Default: `name`. */
  readonly label?: string;
  /** Minimum string length (checked after type validation). */
  readonly minLength?: number;
  /** Maximum string length (checked after type validation). */
  readonly maxLength?: number;
  /** Regex pattern the value must match (checked after length rules). */
  readonly pattern?: RegExp;
  /** Custom rules, run in declaration order after the built-in ones. */
  readonly rules?: readonly FieldRule[];
  /** Alternative input keys that map to this field's canonical name. Case-insensitive. */
  readonly aliases?: readonly string[];
  /** Normalization applied by the transformer (e.g. trimming, casing). */
  readonly transform?: (value: unknown) => unknown;
  /** Value the transformer uses when the field is absent from the draft. */
  readonly defaultValue?: unknown;
  /** When `true`, the transformer replaces the value with its hash. */
  readonly secret?: boolean;
  /** Key used in the request body. Default: `name`. */
  readonly wireName?: string;
  /** When `false`, the field is validated but left out of the request body. Default: `true`. */
  readonly submit?: boolean;
}
