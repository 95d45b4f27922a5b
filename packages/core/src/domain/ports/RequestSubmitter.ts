import type { CanonicalRequest } from '../model/CanonicalRequest.js';
import type { Outcome } from '../model/Outcome.js';

/** Options for a single submission. */
export interface SubmitOptions {
  /** Aborting the signal resolves the submission with a `Cancelled` outcome. */
  readonly signal?: AbortSignal;
}

/**
 * Port for the submit stage.
 *
 * Performs one exchange per call and never rejects: every failure is returned
 * as an `Outcome`. Retry policies wrap a submitter (see `RetryingSubmitter`)
 * rather than living inside it.
 */
export interface RequestSubmitter<TBody, TResult> {
  submit(request: CanonicalRequest<TBody>, options?: SubmitOptions): Promise<Outcome<TResult>>;
}
