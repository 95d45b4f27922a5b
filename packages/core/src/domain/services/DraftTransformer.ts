import { isEmptyValue } from '../model/Draft.js';
import type { FormSchema } from '../model/FormSchema.js';
import type { ValidDraft } from '../model/ValidDraft.js';
import type { CanonicalRequest } from '../model/CanonicalRequest.js';
import { issueRequest } from '../model/CanonicalRequest.js';
import type { RequestTransformer } from '../ports/RequestTransformer.js';
import type { SecretHasher } from '../ports/SecretHasher.js';

/** Field values after normalization and hashing, keyed by wire name. */
export type TransformedFields = Readonly<Record<string, unknown>>;

/** Configuration for a `DraftTransformer`. */
export interface DraftTransformerConfig<TBody> {
  readonly schema: FormSchema;
  /** Hashes `secret` fields. Required when the schema declares any. */
  readonly hasher?: SecretHasher;
  /** Map the transformed fields to the exact body the backend expects. */
  readonly shape: (fields: TransformedFields) => TBody;
}

/**
 * Domain service that turns a valid draft into a canonical request.
 *
 * For each submitted field, in declaration order: fall back to `defaultValue`
 * when the value is empty, apply the field's `transform`, hash it when the
 * field is `secret`, and store it under `wireName`. Empty fields without a
 * default are left out. The draft itself is never modified.
 */
export class DraftTransformer<TBody> implements RequestTransformer<TBody> {
  private readonly schema: FormSchema;
  private readonly hasher: SecretHasher | null;
  private readonly shape: (fields: TransformedFields) => TBody;

  constructor(config: DraftTransformerConfig<TBody>) {
    this.schema = config.schema;
    this.hasher = config.hasher ?? null;
    this.shape = config.shape;

    const secretField = this.schema.fields.find((f) => f.secret && f.submit !== false);
    if (secretField && !this.hasher) {
      throw new Error(`Field '${secretField.name}' is secret but no SecretHasher was configured`);
    }
  }

  async transform(draft: ValidDraft): Promise<CanonicalRequest<TBody>> {
    const fields = await this.buildFields(draft);
    return issueRequest(draft, this.shape(fields));
  }

  private async buildFields(draft: ValidDraft): Promise<TransformedFields> {
    const fields: Record<string, unknown> = {};

    for (const field of this.schema.fields) {
      if (field.submit === false) continue;

      const raw = draft.get(field.name);
      let value: unknown;

      if (!isEmptyValue(raw)) {
        value = field.transform ? field.transform(raw) : raw;
      } else if (field.defaultValue !== undefined) {
        value = field.defaultValue;
      } else {
        continue;
      }

      if (field.secret && this.hasher) {
        value = await this.hasher.hash(String(value));
      }

      fields[field.wireName ?? field.name] = value;
    }

    return fields;
  }
}
