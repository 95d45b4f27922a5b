import type { ValidDraft } from './ValidDraft.js';

const issuance: unique symbol = Symbol('CanonicalRequest.issuance');

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Backend-ready request body, produced once per valid draft.
 *
 * Instances are minted only by `issueRequest()`, which only the transformer
 * calls, and they keep the `ValidDraft` they were derived from, so raw input
 * cannot become a request without passing validation first. The body is a
 * deep-frozen copy; values taken from the caller's input stay writable.
 */
export class CanonicalRequest<TBody> {
  readonly body: TBody;
  /** The certified draft this request was built from. */
  readonly source: ValidDraft;
  private readonly issued: typeof issuance;

  constructor(source: ValidDraft, body: TBody, token: typeof issuance) {
    this.issued = token;
    this.source = source;
    this.body = deepFreeze(structuredClone(body));
  }
}

/** Mint a `CanonicalRequest`. Internal to the transformer: not part of the package's public API. */
export function issueRequest<TBody>(source: ValidDraft, body: TBody): CanonicalRequest<TBody> {
  return new CanonicalRequest(source, body, issuance);
}
