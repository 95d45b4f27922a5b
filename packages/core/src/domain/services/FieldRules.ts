import type { FieldRule, RuleContext, ValidationFieldResult } from '../model/FieldDefinition.js';

/** The value must equal the value of another field (e.g. a password confirmation). */
export function matchesField(otherField: string, message?: string): FieldRule {
  return {
    name: 'matchesField',
    validate: (value, context) => {
      const valid = value === context.draft[otherField];
      return valid
        ? { valid }
        : {
            valid,
            message: message ?? `Field '${context.field}' must match '${otherField}'`,
            metadata: { otherField },
          };
    },
  };
}

/** The value must be one of the allowed values. Strings compare case-sensitively. */
export function oneOf(allowed: readonly unknown[], message?: string): FieldRule {
  return {
    name: 'oneOf',
    validate: (value, context) => {
      const valid = allowed.includes(value);
      return valid
        ? { valid }
        : {
            valid,
            message: message ?? `Field '${context.field}' must be one of: ${allowed.map(String).join(', ')}`,
            metadata: { allowed },
          };
    },
  };
}

/** Build a named rule from a predicate. */
export function satisfies(
  name: string,
  predicate: (value: unknown, context: RuleContext) => boolean,
  message: string,
): FieldRule {
  return {
    name,
    validate: (value, context): ValidationFieldResult =>
      predicate(value, context) ? { valid: true } : { valid: false, message },
  };
}
