import type { ValidDraft } from '../model/ValidDraft.js';
import type { CanonicalRequest } from '../model/CanonicalRequest.js';

/** Port for the transform stage. Accepts only certified drafts and never re-validates. */
export interface RequestTransformer<TBody> {
  transform(draft: ValidDraft): Promise<CanonicalRequest<TBody>>;
}
