import type { CanonicalRequest } from '../model/CanonicalRequest.js';
import type { Failure, Outcome } from '../model/Outcome.js';
import { failure } from '../model/Outcome.js';
import type { RequestSubmitter, SubmitOptions } from '../ports/RequestSubmitter.js';
import { abortMessage, delay } from './cancellation.js';

/** Retry policy for a `RetryingSubmitter`. */
export interface RetryOptions {
  /** Maximum number of retries after the first attempt. Default: `2`. */
  readonly maxRetries?: number;
  /**
   * Base delay in milliseconds between attempts.
   * Uses exponential backoff: `retryDelayMs * 2^(attempt - 1)`.
   * Default: `500`.
   */
  readonly retryDelayMs?: number;
  /** `ServerRejected` statuses worth retrying. Default: `[502, 503, 504]`. */
  readonly retryOnStatus?: readonly number[];
  /** Called before each retry with the 1-based retry number and the failure that triggered it. */
  readonly onRetry?: (attempt: number, cause: Failure) => void;
}

/**
 * Wraps a submitter with a retry policy.
 *
 * Only transport faults and the configured server statuses are retried.
 * Cancellations, validation failures and unreadable responses are returned
 * as they are. Aborting the signal during a backoff returns `Cancelled`.
 */
export class RetryingSubmitter<TBody, TResult> implements RequestSubmitter<TBody, TResult> {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly retryOnStatus: ReadonlySet<number>;
  private readonly onRetry: ((attempt: number, cause: Failure) => void) | null;

  constructor(
    private readonly inner: RequestSubmitter<TBody, TResult>,
    options?: RetryOptions,
  ) {
    this.maxRetries = options?.maxRetries ?? 2;
    this.retryDelayMs = options?.retryDelayMs ?? 500;
    this.retryOnStatus = new Set(options?.retryOnStatus ?? [502, 503, 504]);
    this.onRetry = options?.onRetry ?? null;
  }

  async submit(request: CanonicalRequest<TBody>, options?: SubmitOptions): Promise<Outcome<TResult>> {
    const signal = options?.signal;
    let outcome = await this.inner.submit(request, options);

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      if (outcome.ok || !this.isRetryable(outcome)) return outcome;

      this.onRetry?.(attempt, outcome);

      try {
        await delay(this.retryDelayMs * Math.pow(2, attempt - 1), signal);
      } catch {
        return failure('Cancelled', { message: signal ? abortMessage(signal) : 'Submission was cancelled' });
      }

      outcome = await this.inner.submit(request, options);
    }

    return outcome;
  }

  private isRetryable(outcome: Failure): boolean {
    switch (outcome.kind) {
      case 'TransportError':
        return true;
      case 'ServerRejected':
        return this.retryOnStatus.has(outcome.detail.statusCode);
      default:
        return false;
    }
  }
}
