import type { RawInput } from './domain/model/Draft.js';
import type { FormSchema } from './domain/model/FormSchema.js';
import type { CanonicalRequest } from './domain/model/CanonicalRequest.js';
import type { Outcome } from './domain/model/Outcome.js';
import type { ValidationError } from './domain/model/ValidationResult.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { DraftValidator } from './domain/ports/DraftValidator.js';
import type { RequestTransformer } from './domain/ports/RequestTransformer.js';
import type { RequestSubmitter } from './domain/ports/RequestSubmitter.js';
import { SchemaValidator } from './domain/services/SchemaValidator.js';
import { EventBus } from './application/EventBus.js';
import type { HandlerErrorCallback } from './application/EventBus.js';
import type { PipelineStages } from './application/PipelineStages.js';
import { SubmissionContext } from './application/SubmissionContext.js';
import { RunSubmission } from './application/usecases/RunSubmission.js';
import { PreviewSubmission } from './application/usecases/PreviewSubmission.js';
import { ValidateField } from './application/usecases/ValidateField.js';

/** Configuration for a submission pipeline. */
export interface SubmissionPipelineConfig<TBody, TResult> {
  /** Fields of the form. Drives input collection and, by default, validation. */
  readonly schema: FormSchema;
  /** Turns a valid draft into the backend request (usually a `DraftTransformer`). */
  readonly transformer: RequestTransformer<TBody>;
  /** Sends the request (usually an `HttpSubmitter`, possibly wrapped in a `RetryingSubmitter`). */
  readonly submitter: RequestSubmitter<TBody, TResult>;
  /** Default: `new SchemaValidator(schema)`. */
  readonly validator?: DraftValidator;
  /** Receives errors thrown by event subscribers. Subscriber errors never affect a run. */
  readonly onHandlerError?: HandlerErrorCallback;
}

/** Options for a single `run()`. */
export interface RunOptions {
  /** Abort to cancel the run; it then resolves with a `Cancelled` failure. */
  readonly signal?: AbortSignal;
}

/**
 * Facade that orchestrates a submission: collect → validate → transform → submit.
 *
 * Delegates each operation to a use case in `application/usecases/`. The
 * stages are injected, so any of them can be swapped (e.g. a fake submitter in
 * tests). `run()` always resolves with an `Outcome`; a failure at any stage
 * skips the stages after it.
 *
 * @example
 * ```typescript
 * const pipeline = new SubmissionPipeline({ schema, transformer, submitter });
 * const outcome = await pipeline.run({ username: 'alice', password: 'longenough1' });
 * if (!outcome.ok && outcome.kind === 'ValidationFailed') showErrors(outcome.detail.errors);
 * ```
 */
export class SubmissionPipeline<TBody, TResult> {
  private readonly stages: PipelineStages<TBody, TResult>;
  private readonly eventBus: EventBus;

  constructor(config: SubmissionPipelineConfig<TBody, TResult>) {
    this.stages = {
      schema: config.schema,
      validator: config.validator ?? new SchemaValidator(config.schema),
      transformer: config.transformer,
      submitter: config.submitter,
    };
    this.eventBus = new EventBus(config.onHandlerError);
  }

  /** Run the whole pipeline for one input. Never rejects. */
  async run(input: RawInput, options?: RunOptions): Promise<Outcome<TResult>> {
    const ctx = new SubmissionContext(this.eventBus, options?.signal);
    return new RunSubmission(this.stages, ctx).execute(input);
  }

  /** Build the request an input would produce without sending it. */
  async preview(input: RawInput): Promise<Outcome<CanonicalRequest<TBody>>> {
    return new PreviewSubmission(this.stages).execute(input);
  }

  /** Validate one field of an input, for per-field feedback in the UI. */
  validateField(field: string, input: RawInput): readonly ValidationError[] {
    return new ValidateField(this.stages).execute(field, input);
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }
}
