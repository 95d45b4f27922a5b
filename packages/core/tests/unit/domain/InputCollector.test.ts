import { describe, it, expect } from 'vitest';
import { InputCollector } from '../../../src/domain/services/InputCollector.js';
import type { FormSchema } from '../../../src/domain/model/FormSchema.js';

const schema: FormSchema = {
  fields: [
    { name: 'username', type: 'string', required: true, aliases: ['login', 'user_name'] },
    { name: 'password', type: 'string', required: true },
  ],
};

describe('InputCollector', () => {
  it('should resolve keys case-insensitively and through aliases', () => {
    const draft = InputCollector.collect(schema, { Login: 'alice', PASSWORD: 'longenough1' });

    expect(draft).toEqual({ username: 'alice', password: 'longenough1' });
  });

  it('should drop keys that match no field', () => {
    const draft = InputCollector.collect(schema, { username: 'alice', remember: true });

    expect(draft).toEqual({ username: 'alice' });
  });

  it('should keep unknown keys in strict schemas', () => {
    const draft = InputCollector.collect({ ...schema, strict: true }, { username: 'alice', remember: true });

    expect(draft).toEqual({ username: 'alice', remember: true });
  });

  it('should keep the first key that resolves to a field when merging', () => {
    const draft = InputCollector.collect(schema, { username: 'alice', user_name: 'bob' });

    expect(draft).toEqual({ username: 'alice' });
  });

  it('should let later set() calls overwrite earlier values', () => {
    const collector = new InputCollector(schema);

    collector.set('username', 'alice').set('login', 'bob');

    expect(collector.snapshot()).toEqual({ username: 'bob' });
  });

  it('should ignore set() for unknown keys', () => {
    const collector = new InputCollector(schema);

    collector.set('remember', true);

    expect(collector.snapshot()).toEqual({});
  });

  it('should forget values with unset() and reset()', () => {
    const collector = new InputCollector(schema).merge({ username: 'alice', password: 'longenough1' });

    collector.unset('LOGIN');
    expect(collector.snapshot()).toEqual({ password: 'longenough1' });

    collector.reset();
    expect(collector.snapshot()).toEqual({});
  });

  it('should return frozen snapshots unaffected by later changes', () => {
    const collector = new InputCollector(schema).set('username', 'alice');

    const first = collector.snapshot();
    collector.set('username', 'bob');

    expect(Object.isFrozen(first)).toBe(true);
    expect(first).toEqual({ username: 'alice' });
    expect(collector.snapshot()).toEqual({ username: 'bob' });
  });

  it('should not modify the input object', () => {
    const input = { Login: 'alice' };

    InputCollector.collect(schema, input);

    expect(input).toEqual({ Login: 'alice' });
  });
});
