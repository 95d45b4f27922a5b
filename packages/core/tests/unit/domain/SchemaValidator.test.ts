import { describe, it, expect } from 'vitest';
import { SchemaValidator } from '../../../src/domain/services/SchemaValidator.js';
import { matchesField } from '../../../src/domain/services/FieldRules.js';
import type { FormSchema } from '../../../src/domain/model/FormSchema.js';

const signupSchema: FormSchema = {
  fields: [
    { name: 'username', type: 'string', required: true },
    { name: 'password', type: 'string', required: true, minLength: 8 },
  ],
};

describe('SchemaValidator', () => {
  it('should collect every violation across fields', () => {
    const validator = new SchemaValidator(signupSchema);

    const result = validator.validate({ username: '', password: 'short' });

    expect(result.isValid).toBe(false);
    if (result.isValid) return;
    expect(result.errors).toEqual([
      { field: 'username', rule: 'required', message: "Field 'username' is required" },
      {
        field: 'password',
        rule: 'minLength',
        message: "Field 'password' must be at least 8 characters",
        metadata: { min: 8 },
      },
    ]);
  });

  it('should certify a clean draft', () => {
    const validator = new SchemaValidator(signupSchema);

    const result = validator.validate({ username: 'alice', password: 'longenough1' });

    expect(result.isValid).toBe(true);
    if (!result.isValid) return;
    expect(result.draft.values).toEqual({ username: 'alice', password: 'longenough1' });
    expect(Object.isFrozen(result.draft.values)).toBe(true);
  });

  it('should return equal results when called twice on the same draft', () => {
    const validator = new SchemaValidator(signupSchema);
    const draft = { username: '', password: 'short' };

    expect(validator.validate(draft)).toEqual(validator.validate(draft));
  });

  it('should treat whitespace-only strings, null and empty arrays as missing', () => {
    const validator = new SchemaValidator({
      fields: [
        { name: 'a', type: 'string', required: true },
        { name: 'b', type: 'string', required: true },
        { name: 'c', type: 'custom', required: true },
      ],
    });

    const result = validator.validate({ a: '   ', b: null, c: [] });

    expect(result.isValid).toBe(false);
    if (result.isValid) return;
    expect(result.errors.map((e) => `${e.field}:${e.rule}`)).toEqual(['a:required', 'b:required', 'c:required']);
  });

  it('should skip every rule of an empty optional field', () => {
    const validator = new SchemaValidator({
      fields: [{ name: 'nickname', type: 'string', required: false, minLength: 3, pattern: /^[a-z]+$/ }],
    });

    expect(validator.validate({}).isValid).toBe(true);
    expect(validator.validate({ nickname: '' }).isValid).toBe(true);
  });

  it('should report a type mismatch and skip the remaining rules of that field', () => {
    const validator = new SchemaValidator({
      fields: [{ name: 'age', type: 'number', required: true, minLength: 5, pattern: /^\d+$/ }],
    });

    const result = validator.validate({ age: 'abc' });

    expect(result.isValid).toBe(false);
    if (result.isValid) return;
    expect(result.errors).toEqual([{ field: 'age', rule: 'type', message: "Field 'age' must be a number" }]);
  });

  it('should check built-in types', () => {
    const validator = new SchemaValidator({
      fields: [
        { name: 'count', type: 'number', required: true },
        { name: 'active', type: 'boolean', required: true },
        { name: 'birthday', type: 'date', required: true },
        { name: 'email', type: 'email', required: true },
      ],
    });

    const bad = validator.validate({ count: Infinity, active: 'maybe', birthday: 'not-a-date', email: 'nope' });
    expect(bad.isValid).toBe(false);
    if (bad.isValid) return;
    expect(bad.errors.map((e) => e.message)).toEqual([
      "Field 'count' must be a number",
      "Field 'active' must be a boolean",
      "Field 'birthday' must be a valid date",
      "Field 'email' must be a valid email",
    ]);

    const good = validator.validate({ count: ' 42 ', active: 'Yes', birthday: '2024-02-29', email: 'a@b.io' });
    expect(good.isValid).toBe(true);
  });

  it('should reject numeric strings that do not parse to a finite number', () => {
    const validator = new SchemaValidator({ fields: [{ name: 'count', type: 'number', required: true }] });

    for (const count of ['Infinity', '-Infinity', '1e400', 'NaN']) {
      expect(validator.validateField('count', { count })).toEqual([
        { field: 'count', rule: 'type', message: "Field 'count' must be a number" },
      ]);
    }
    expect(validator.validateField('count', { count: '1e3' })).toEqual([]);
  });

  it('should accept native booleans and dates', () => {
    const validator = new SchemaValidator({
      fields: [
        { name: 'active', type: 'boolean', required: true },
        { name: 'at', type: 'date', required: true },
      ],
    });

    expect(validator.validate({ active: false, at: new Date(0) }).isValid).toBe(true);
    expect(validator.validate({ active: true, at: new Date('invalid') }).isValid).toBe(false);
  });

  it('should order errors by rule within a field', () => {
    const validator = new SchemaValidator({
      fields: [
        { name: 'code', type: 'string', required: true, maxLength: 3, pattern: /^[A-Z]+$/ },
        { name: 'other', type: 'string', required: true },
      ],
    });

    const result = validator.validate({ code: 'abcd' });

    expect(result.isValid).toBe(false);
    if (result.isValid) return;
    expect(result.errors).toEqual([
      {
        field: 'code',
        rule: 'maxLength',
        message: "Field 'code' must be at most 3 characters",
        metadata: { max: 3 },
      },
      { field: 'code', rule: 'pattern', message: "Field 'code' does not match pattern /^[A-Z]+$/" },
      { field: 'other', rule: 'required', message: "Field 'other' is required" },
    ]);
  });

  it('should give the same answer for global patterns on repeated calls', () => {
    const validator = new SchemaValidator({
      fields: [{ name: 'slug', type: 'string', required: true, pattern: /^[a-z-]+$/g }],
    });

    expect(validator.validate({ slug: 'hello-world' }).isValid).toBe(true);
    expect(validator.validate({ slug: 'hello-world' }).isValid).toBe(true);
  });

  it('should use the field label in messages', () => {
    const validator = new SchemaValidator({
      fields: [{ name: 'firstName', type: 'string', required: true, label: 'first name' }],
    });

    const result = validator.validate({});

    expect(result.isValid).toBe(false);
    if (result.isValid) return;
    expect(result.errors[0]?.message).toBe("Field 'first name' is required");
  });

  it('should run cross-field rules against the whole draft', () => {
    const validator = new SchemaValidator({
      fields: [
        { name: 'password', type: 'string', required: true },
        { name: 'confirm', type: 'string', required: true, rules: [matchesField('password')] },
      ],
    });

    const result = validator.validate({ password: 'longenough1', confirm: 'longenough2' });

    expect(result.isValid).toBe(false);
    if (result.isValid) return;
    expect(result.errors).toEqual([
      {
        field: 'confirm',
        rule: 'matchesField',
        message: "Field 'confirm' must match 'password'",
        metadata: { otherField: 'password' },
      },
    ]);
  });

  it('should fall back to a generic message for custom rules without one', () => {
    const validator = new SchemaValidator({
      fields: [
        {
          name: 'code',
          type: 'custom',
          required: true,
          rules: [{ name: 'checksum', validate: () => ({ valid: false }) }],
        },
      ],
    });

    const result = validator.validate({ code: 'X1' });

    expect(result.isValid).toBe(false);
    if (result.isValid) return;
    expect(result.errors).toEqual([{ field: 'code', rule: 'checksum', message: "Field 'code' failed rule 'checksum'" }]);
  });

  it('should report a custom rule that throws as a failure of that rule', () => {
    const validator = new SchemaValidator({
      fields: [
        {
          name: 'coupon',
          type: 'string',
          required: true,
          label: 'coupon code',
          rules: [
            {
              name: 'knownCoupon',
              validate: () => {
                throw new Error('coupon table not loaded');
              },
            },
          ],
        },
      ],
    });

    expect(validator.validateField('coupon', { coupon: 'SPRING' })).toEqual([
      {
        field: 'coupon',
        rule: 'knownCoupon',
        message: "Field 'coupon code' could not be checked by rule 'knownCoupon': coupon table not loaded",
      },
    ]);
  });

  it('should report unknown fields after field errors in strict mode', () => {
    const validator = new SchemaValidator({
      fields: [{ name: 'name', type: 'string', required: true }],
      strict: true,
    });

    const result = validator.validate({ extra: 1, name: '' });

    expect(result.isValid).toBe(false);
    if (result.isValid) return;
    expect(result.errors).toEqual([
      { field: 'name', rule: 'required', message: "Field 'name' is required" },
      { field: 'extra', rule: 'unknownField', message: "Unknown field 'extra' is not allowed in strict mode" },
    ]);
  });

  it('should ignore unknown fields when not strict', () => {
    const validator = new SchemaValidator(signupSchema);

    expect(validator.validate({ username: 'alice', password: 'longenough1', extra: true }).isValid).toBe(true);
  });

  describe('validateField', () => {
    it('should return only the errors of the requested field', () => {
      const validator = new SchemaValidator(signupSchema);

      expect(validator.validateField('password', { username: '', password: 'short' })).toEqual([
        {
          field: 'password',
          rule: 'minLength',
          message: "Field 'password' must be at least 8 characters",
          metadata: { min: 8 },
        },
      ]);
      expect(validator.validateField('password', { password: 'longenough1' })).toEqual([]);
    });

    it('should return nothing for an undeclared field unless strict', () => {
      expect(new SchemaValidator(signupSchema).validateField('extra', { extra: 1 })).toEqual([]);

      const strict = new SchemaValidator({ ...signupSchema, strict: true });
      expect(strict.validateField('extra', { extra: 1 })).toEqual([
        { field: 'extra', rule: 'unknownField', message: "Unknown field 'extra' is not allowed in strict mode" },
      ]);
    });
  });

  it('should throw on duplicate field names', () => {
    expect(
      () =>
        new SchemaValidator({
          fields: [
            { name: 'email', type: 'email', required: true },
            { name: 'Email', type: 'string', required: false },
          ],
        }),
    ).toThrow("Form schema declares 'Email' more than once");
  });

  it('should throw when an alias collides with a field name', () => {
    expect(
      () =>
        new SchemaValidator({
          fields: [
            { name: 'email', type: 'email', required: true },
            { name: 'mail', type: 'string', required: false, aliases: ['EMAIL'] },
          ],
        }),
    ).toThrow("Form schema declares 'EMAIL' more than once");
  });
});
