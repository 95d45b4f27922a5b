import type { RawInput } from '../../domain/model/Draft.js';
import type { CanonicalRequest } from '../../domain/model/CanonicalRequest.js';
import type { Outcome } from '../../domain/model/Outcome.js';
import { failure, success } from '../../domain/model/Outcome.js';
import { InputCollector } from '../../domain/services/InputCollector.js';
import type { PipelineStages } from '../PipelineStages.js';

/** Use case: build the request an input would produce, without submitting it. */
export class PreviewSubmission<TBody, TResult> {
  constructor(private readonly stages: PipelineStages<TBody, TResult>) {}

  async execute(input: RawInput): Promise<Outcome<CanonicalRequest<TBody>>> {
    const draft = InputCollector.collect(this.stages.schema, input);
    const validation = this.stages.validator.validate(draft);

    if (!validation.isValid) {
      return failure('ValidationFailed', { errors: validation.errors });
    }

    try {
      return success(await this.stages.transformer.transform(validation.draft));
    } catch (error) {
      return failure('TransformFailed', { message: error instanceof Error ? error.message : String(error) });
    }
  }
}
