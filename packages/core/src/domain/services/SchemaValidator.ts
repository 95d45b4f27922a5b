import type { Draft } from '../model/Draft.js';
import { isEmptyValue } from '../model/Draft.js';
import type { FormSchema } from '../model/FormSchema.js';
import { assertUniqueFieldNames } from '../model/FormSchema.js';
import type { FieldDefinition, FieldRule, RuleContext, ValidationFieldResult } from '../model/FieldDefinition.js';
import type { ValidationResult, ValidationError } from '../model/ValidationResult.js';
import { validResult, invalidResult } from '../model/ValidationResult.js';
import { certifyDraft } from '../model/ValidDraft.js';
import type { DraftValidator } from '../ports/DraftValidator.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const BOOLEAN_VALUES = ['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'];

/**
 * Domain service that validates drafts against a form schema.
 *
 * Every field is checked, so the caller receives all violations at once.
 * Errors follow field declaration order, then rule order within a field:
 * `required`, `type`, `minLength`, `maxLength`, `pattern`, then custom rules.
 * Unknown keys (strict schemas only) are reported last.
 */
export class SchemaValidator implements DraftValidator {
  private readonly fieldsByName: ReadonlyMap<string, FieldDefinition>;

  constructor(private readonly schema: FormSchema) {
    assertUniqueFieldNames(schema);
    this.fieldsByName = new Map(schema.fields.map((f) => [f.name, f]));
  }

  /** Validate a draft against all field definitions. A clean draft comes back certified. */
  validate(draft: Draft): ValidationResult {
    const errors: ValidationError[] = [];

    for (const field of this.schema.fields) {
      errors.push(...this.validateDefinedField(field, draft));
    }

    if (this.schema.strict) {
      for (const key of Object.keys(draft)) {
        if (!this.fieldsByName.has(key)) {
          errors.push(this.unknownFieldError(key));
        }
      }
    }

    return errors.length === 0 ? validResult(certifyDraft(draft)) : invalidResult(errors);
  }

  /** Validate one field, with the rest of the draft available to cross-field rules. */
  validateField(field: string, draft: Draft): readonly ValidationError[] {
    const definition = this.fieldsByName.get(field);
    if (definition) return this.validateDefinedField(definition, draft);

    if (this.schema.strict && Object.prototype.hasOwnProperty.call(draft, field)) {
      return [this.unknownFieldError(field)];
    }
    return [];
  }

  private validateDefinedField(field: FieldDefinition, draft: Draft): ValidationError[] {
    const value = draft[field.name];
    const label = field.label ?? field.name;
    const errors: ValidationError[] = [];

    if (isEmptyValue(value)) {
      if (field.required) {
        errors.push({ field: field.name, rule: 'required', message: `Field '${label}' is required` });
      }
      return errors;
    }

    if (field.type !== 'custom') {
      const typeError = this.validateType(field, label, value);
      if (typeError) return [typeError];
    }

    const stringValue = String(value);

    if (field.minLength !== undefined && stringValue.length < field.minLength) {
      errors.push({
        field: field.name,
        rule: 'minLength',
        message: `Field '${label}' must be at least ${String(field.minLength)} characters`,
        metadata: { min: field.minLength },
      });
    }

    if (field.maxLength !== undefined && stringValue.length > field.maxLength) {
      errors.push({
        field: field.name,
        rule: 'maxLength',
        message: `Field '${label}' must be at most ${String(field.maxLength)} characters`,
        metadata: { max: field.maxLength },
      });
    }

    // search() ignores lastIndex, so patterns with the g or y flag stay stateless.
    if (field.pattern && stringValue.search(field.pattern) === -1) {
      errors.push({
        field: field.name,
        rule: 'pattern',
        message: `Field '${label}' does not match pattern ${String(field.pattern)}`,
      });
    }

    for (const rule of field.rules ?? []) {
      const result = this.applyRule(rule, label, value, { field: field.name, draft });
      if (!result.valid) {
        errors.push({
          field: field.name,
          rule: rule.name,
          message: result.message ?? `Field '${label}' failed rule '${rule.name}'`,
          ...(result.metadata ? { metadata: result.metadata } : {}),
        });
      }
    }

    return errors;
  }

  private applyRule(rule: FieldRule, label: string, value: unknown, context: RuleContext): ValidationFieldResult {
    try {
      return rule.validate(value, context);
    } catch (error) {
      return {
        valid: false,
        message: `Field '${label}' could not be checked by rule '${rule.name}': ${
          error instanceof Error ? error.message : String(error)
        }`,
      };
    }
  }

  private validateType(field: FieldDefinition, label: string, value: unknown): ValidationError | null {
    const stringValue = String(value).trim();

    switch (field.type) {
      case 'number': {
        if (!Number.isFinite(typeof value === 'number' ? value : Number(stringValue))) {
          return { field: field.name, rule: 'type', message: `Field '${label}' must be a number` };
        }
        return null;
      }
      case 'boolean': {
        if (typeof value !== 'boolean' && !BOOLEAN_VALUES.includes(stringValue.toLowerCase())) {
          return { field: field.name, rule: 'type', message: `Field '${label}' must be a boolean` };
        }
        return null;
      }
      case 'date': {
        const time = value instanceof Date ? value.getTime() : new Date(stringValue).getTime();
        if (isNaN(time)) {
          return { field: field.name, rule: 'type', message: `Field '${label}' must be a valid date` };
        }
        return null;
      }
      case 'email': {
        if (!EMAIL_PATTERN.test(stringValue)) {
          return { field: field.name, rule: 'type', message: `Field '${label}' must be a valid email` };
        }
        return null;
      }
      case 'string':
      case 'custom':
        return null;
    }
  }

  private unknownFieldError(key: string): ValidationError {
    return {
      field: key,
      rule: 'unknownField',
      message: `Unknown field '${key}' is not allowed in strict mode`,
    };
  }
}
