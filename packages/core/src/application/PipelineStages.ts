import type { FormSchema } from '../domain/model/FormSchema.js';
import type { DraftValidator } from '../domain/ports/DraftValidator.js';
import type { RequestTransformer } from '../domain/ports/RequestTransformer.js';
import type { RequestSubmitter } from '../domain/ports/RequestSubmitter.js';

/** The stages a pipeline is assembled from. Shared, read-only, across runs. */
export interface PipelineStages<TBody, TResult> {
  readonly schema: FormSchema;
  readonly validator: DraftValidator;
  readonly transformer: RequestTransformer<TBody>;
  readonly submitter: RequestSubmitter<TBody, TResult>;
}
