import type { TransportReason } from '../model/Outcome.js';

/** Why an `HttpClient` could not complete an exchange. `aborted` means the caller's signal fired. */
export type TransportErrorReason = TransportReason | 'aborted';

/**
 * Thrown by `HttpClient` implementations when an exchange produces no response.
 *
 * Submitters catch it and map it to a `TransportError` or `Cancelled` outcome;
 * it never reaches the pipeline's caller.
 */
export class TransportError extends Error {
  override readonly name = 'TransportError';

  constructor(
    readonly reason: TransportErrorReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
