import type { CanonicalRequest } from '../src/domain/model/CanonicalRequest.js';
import type { RawInput } from '../src/domain/model/Draft.js';
import type { FieldDefinition } from '../src/domain/model/FieldDefinition.js';
import type { FormSchema } from '../src/domain/model/FormSchema.js';
import type { ValidDraft } from '../src/domain/model/ValidDraft.js';
import { DraftTransformer } from '../src/domain/services/DraftTransformer.js';
import type { TransformedFields } from '../src/domain/services/DraftTransformer.js';
import { InputCollector } from '../src/domain/services/InputCollector.js';
import { SchemaValidator } from '../src/domain/services/SchemaValidator.js';

/** Run input through the collector and validator; fails the test when the input is invalid. */
export function certify(schema: FormSchema, input: RawInput): ValidDraft {
  const result = new SchemaValidator(schema).validate(InputCollector.collect(schema, input));
  if (!result.isValid) {
    throw new Error(`Expected valid input, got: ${result.errors.map((e) => e.message).join('; ')}`);
  }
  return result.draft;
}

/** A canonical request carrying the given fields, built through the validator and transformer. */
export function requestWithBody(
  fields: Readonly<Record<string, string>>,
): Promise<CanonicalRequest<TransformedFields>> {
  const schema: FormSchema = {
    fields: Object.keys(fields).map((name): FieldDefinition => ({ name, type: 'string', required: true })),
  };
  return new DraftTransformer({ schema, shape: (transformed) => transformed }).transform(certify(schema, fields));
}
