import type { Draft } from './Draft.js';

const certification: unique symbol = Symbol('ValidDraft.certification');

/**
 * A draft that has passed validation.
 *
 * The constructor demands a token private to this module, so the only way to
 * obtain an instance is through `certifyDraft()`, which only the validator calls.
 * The private member makes the type nominal: an object literal with the same
 * public shape is not a `ValidDraft`.
 * Everything downstream of validation accepts `ValidDraft`, never `Draft`.
 */
export class ValidDraft {
  readonly values: Draft;
  private readonly certified: typeof certification;

  constructor(values: Draft, token: typeof certification) {
    this.certified = token;
    this.values = Object.freeze({ ...values });
  }

  /** Read a field value. */
  get(field: string): unknown {
    return this.values[field];
  }

  /** Whether the draft holds a value (possibly empty) for the field. */
  has(field: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, field);
  }
}

/** Mint a `ValidDraft`. Internal to the validator: not part of the package's public API. */
export function certifyDraft(values: Draft): ValidDraft {
  return new ValidDraft(values, certification);
}
