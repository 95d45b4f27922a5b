import type { Draft, RawInput } from '../model/Draft.js';
import type { FormSchema } from '../model/FormSchema.js';
import { assertUniqueFieldNames } from '../model/FormSchema.js';

/**
 * Gathers raw user-entered values into a draft.
 *
 * Input keys are resolved to canonical field names case-insensitively and
 * through declared aliases. Keys matching no field are dropped, except in
 * strict schemas, where they are kept for the validator to report.
 *
 * @example
 * ```typescript
 * const collector = new InputCollector(schema);
 * collector.set('username', 'alice').set('Password', 'longenough1');
 * const draft = collector.snapshot();
 * ```
 */
export class InputCollector {
  private readonly aliasMap: ReadonlyMap<string, string>;
  private readonly values = new Map<string, unknown>();

  constructor(private readonly schema: FormSchema) {
    assertUniqueFieldNames(schema);
    this.aliasMap = this.buildAliasMap();
  }

  /** Collect a whole input object in one step. */
  static collect(schema: FormSchema, input: RawInput): Draft {
    return new InputCollector(schema).merge(input).snapshot();
  }

  /** Record the value entered for a field. Returns `this` for chaining. */
  set(key: string, value: unknown): this {
    const canonical = this.resolve(key);
    if (canonical !== null) {
      this.values.set(canonical, value);
    }
    return this;
  }

  /** Record every key of an input object. The first key resolving to a field wins. */
  merge(input: RawInput): this {
    const assigned = new Set<string>();

    for (const [key, value] of Object.entries(input)) {
      const canonical = this.resolve(key);
      if (canonical === null || assigned.has(canonical)) continue;
      assigned.add(canonical);
      this.values.set(canonical, value);
    }

    return this;
  }

  /** Forget the value of a field. */
  unset(key: string): this {
    const canonical = this.resolve(key);
    if (canonical !== null) {
      this.values.delete(canonical);
    }
    return this;
  }

  /** Forget every value. */
  reset(): this {
    this.values.clear();
    return this;
  }

  /** Frozen copy of the values gathered so far. Later changes to the collector do not affect it. */
  snapshot(): Draft {
    return Object.freeze(Object.fromEntries(this.values));
  }

  private resolve(key: string): string | null {
    const canonical = this.aliasMap.get(key.toLowerCase());
    if (canonical !== undefined) return canonical;
    return this.schema.strict ? key : null;
  }

  private buildAliasMap(): Map<string, string> {
    const map = new Map<string, string>();

    for (const field of this.schema.fields) {
      map.set(field.name.toLowerCase(), field.name);

      for (const alias of field.aliases ?? []) {
        map.set(alias.toLowerCase(), field.name);
      }
    }

    return map;
  }
}
