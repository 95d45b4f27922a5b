import type { RawInput } from '../../domain/model/Draft.js';
import type { CanonicalRequest } from '../../domain/model/CanonicalRequest.js';
import type { Outcome } from '../../domain/model/Outcome.js';
import { describeFailure, failure } from '../../domain/model/Outcome.js';
import type { ValidationError } from '../../domain/model/ValidationResult.js';
import { InputCollector } from '../../domain/services/InputCollector.js';
import { abortMessage } from '../../domain/services/cancellation.js';
import type { PipelineStages } from '../PipelineStages.js';
import type { SubmissionContext } from '../SubmissionContext.js';

/** Use case: collect, validate, transform and submit one input. */
export class RunSubmission<TBody, TResult> {
  constructor(
    private readonly stages: PipelineStages<TBody, TResult>,
    private readonly ctx: SubmissionContext,
  ) {}

  async execute(input: RawInput): Promise<Outcome<TResult>> {
    const { stages, ctx } = this;

    ctx.emit({ type: 'submission:started', submissionId: ctx.submissionId, timestamp: Date.now() });

    if (ctx.signal?.aborted) {
      return this.cancel(abortMessage(ctx.signal));
    }

    ctx.transitionTo('VALIDATING');
    const draft = InputCollector.collect(stages.schema, input);
    const validation = stages.validator.validate(draft);

    if (!validation.isValid) {
      return this.reject(validation.errors);
    }

    ctx.transitionTo('TRANSFORMING');
    let request: CanonicalRequest<TBody>;
    try {
      request = await stages.transformer.transform(validation.draft);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.settle(failure('TransformFailed', { message }));
    }
    ctx.emit({ type: 'submission:transformed', submissionId: ctx.submissionId, timestamp: Date.now() });

    if (ctx.signal?.aborted) {
      return this.cancel(abortMessage(ctx.signal));
    }

    ctx.transitionTo('SUBMITTING');
    ctx.emit({ type: 'submission:submitting', submissionId: ctx.submissionId, timestamp: Date.now() });

    let outcome: Outcome<TResult>;
    try {
      outcome = await stages.submitter.submit(request, { signal: ctx.signal });
    } catch (error) {
      // Submitters resolve with failures; this covers one that breaks that contract.
      const message = error instanceof Error ? error.message : String(error);
      outcome = ctx.signal?.aborted
        ? failure('Cancelled', { message: abortMessage(ctx.signal) })
        : failure('TransportError', { reason: 'network', message });
    }

    return this.settle(outcome);
  }

  private settle(outcome: Outcome<TResult>): Outcome<TResult> {
    const { ctx } = this;

    if (outcome.ok) {
      ctx.transitionTo('SUCCEEDED');
      ctx.emit({
        type: 'submission:succeeded',
        submissionId: ctx.submissionId,
        durationMs: ctx.elapsedMs(),
        timestamp: Date.now(),
      });
      return outcome;
    }

    switch (outcome.kind) {
      case 'Cancelled':
        return this.cancel(outcome.detail.message);
      case 'ValidationFailed':
        return this.reject(outcome.detail.errors);
      default:
        ctx.transitionTo('FAILED');
        ctx.emit({
          type: 'submission:failed',
          submissionId: ctx.submissionId,
          kind: outcome.kind,
          error: describeFailure(outcome),
          durationMs: ctx.elapsedMs(),
          timestamp: Date.now(),
        });
        return outcome;
    }
  }

  private reject(errors: readonly ValidationError[]): Outcome<TResult> {
    const { ctx } = this;
    ctx.transitionTo('INVALID');
    ctx.emit({ type: 'submission:invalid', submissionId: ctx.submissionId, errors, timestamp: Date.now() });
    return failure('ValidationFailed', { errors });
  }

  private cancel(message: string): Outcome<TResult> {
    const { ctx } = this;
    ctx.transitionTo('CANCELLED');
    ctx.emit({ type: 'submission:cancelled', submissionId: ctx.submissionId, reason: message, timestamp: Date.now() });
    return failure('Cancelled', { message });
  }
}
