import type { ValidationError } from './ValidationResult.js';

/** Why a transport-level exchange failed. */
export type TransportReason = 'timeout' | 'connection-refused' | 'network';

/** Detail carried by each failure kind. */
export interface FailureDetails {
  /** One or more field rule violations. Recoverable by correcting the input. */
  readonly ValidationFailed: { readonly errors: readonly ValidationError[] };
  /** A derivation (e.g. secret hashing) rejected. */
  readonly TransformFailed: { readonly message: string };
  /** The exchange never produced a response. Recoverable by a retry outside the pipeline. */
  readonly TransportError: { readonly reason: TransportReason; readonly message: string };
  /** The server answered with a non-success status. */
  readonly ServerRejected: { readonly statusCode: number; readonly reason: string; readonly body?: unknown };
  /** The server answered 2xx with a body the response mapper could not read. */
  readonly UnexpectedResponse: { readonly statusCode: number; readonly message: string };
  /** The caller aborted the run. */
  readonly Cancelled: { readonly message: string };
}

/** Failure taxonomy. */
export type ErrorKind = keyof FailureDetails;

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

/** A failure of one kind, with that kind's detail. */
export interface FailureOf<K extends ErrorKind> {
  readonly ok: false;
  readonly kind: K;
  readonly detail: FailureDetails[K];
}

/** Union over every failure kind, discriminated by `kind`. */
export type Failure = { [K in ErrorKind]: FailureOf<K> }[ErrorKind];

/** Terminal result of a pipeline run. */
export type Outcome<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure<K extends ErrorKind>(kind: K, detail: FailureDetails[K]): FailureOf<K> {
  return { ok: false, kind, detail };
}

export function isSuccess<T>(outcome: Outcome<T>): outcome is Success<T> {
  return outcome.ok;
}

export function isFailure<T>(outcome: Outcome<T>): outcome is Failure {
  return !outcome.ok;
}

/** Narrow an outcome to a failure of the given kind. */
export function isFailureOf<T, K extends ErrorKind>(
  outcome: Outcome<T>,
  kind: K,
): outcome is Extract<Failure, { readonly kind: K }> {
  return !outcome.ok && outcome.kind === kind;
}

/** One-line description of a failure, for event payloads and UI banners. */
export function describeFailure(outcome: Failure): string {
  switch (outcome.kind) {
    case 'ValidationFailed':
      return `${String(outcome.detail.errors.length)} validation error(s)`;
    case 'TransformFailed':
      return outcome.detail.message;
    case 'TransportError':
      return `${outcome.detail.reason}: ${outcome.detail.message}`;
    case 'ServerRejected':
      return `HTTP ${String(outcome.detail.statusCode)}: ${outcome.detail.reason}`;
    case 'UnexpectedResponse':
      return `HTTP ${String(outcome.detail.statusCode)}: ${outcome.detail.message}`;
    case 'Cancelled':
      return outcome.detail.message;
  }
}
