import type { RawInput } from '../../domain/model/Draft.js';
import type { ValidationError } from '../../domain/model/ValidationResult.js';
import { InputCollector } from '../../domain/services/InputCollector.js';
import type { PipelineStages } from '../PipelineStages.js';

/** Use case: validate a single field for live feedback while the user types. */
export class ValidateField<TBody, TResult> {
  constructor(private readonly stages: PipelineStages<TBody, TResult>) {}

  execute(field: string, input: RawInput): readonly ValidationError[] {
    const draft = InputCollector.collect(this.stages.schema, input);
    return this.stages.validator.validateField(field, draft);
  }
}
