import type { ErrorKind } from '../model/Outcome.js';
import type { ValidationError } from '../model/ValidationResult.js';

/** Emitted when `run()` is called. */
export interface SubmissionStartedEvent {
  readonly type: 'submission:started';
  readonly submissionId: string;
  readonly timestamp: number;
}

/** Emitted when the draft fails validation. The submission ends here. */
export interface SubmissionInvalidEvent {
  readonly type: 'submission:invalid';
  readonly submissionId: string;
  readonly errors: readonly ValidationError[];
  readonly timestamp: number;
}

/** Emitted once the canonical request has been built. The body is left out: it may hold hashed secrets. */
export interface SubmissionTransformedEvent {
  readonly type: 'submission:transformed';
  readonly submissionId: string;
  readonly timestamp: number;
}

/** Emitted right before the submitter is called. */
export interface SubmissionSubmittingEvent {
  readonly type: 'submission:submitting';
  readonly submissionId: string;
  readonly timestamp: number;
}

/** Emitted when the submitter returns a success outcome. */
export interface SubmissionSucceededEvent {
  readonly type: 'submission:succeeded';
  readonly submissionId: string;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted for every failure outcome other than validation and cancellation. */
export interface SubmissionFailedEvent {
  readonly type: 'submission:failed';
  readonly submissionId: string;
  readonly kind: Exclude<ErrorKind, 'ValidationFailed' | 'Cancelled'>;
  readonly error: string;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when the caller aborted the run. */
export interface SubmissionCancelledEvent {
  readonly type: 'submission:cancelled';
  readonly submissionId: string;
  readonly reason: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | SubmissionStartedEvent
  | SubmissionInvalidEvent
  | SubmissionTransformedEvent
  | SubmissionSubmittingEvent
  | SubmissionSucceededEvent
  | SubmissionFailedEvent
  | SubmissionCancelledEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
