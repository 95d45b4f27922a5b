/** Raw key-value input handed to the pipeline by the caller (form state, request params). */
export interface RawInput {
  readonly [key: string]: unknown;
}

/**
 * Field values gathered for one submission attempt.
 *
 * Structurally identical to `RawInput` but semantically distinct: keys have been
 * resolved to canonical field names and unknown keys dropped (unless the schema
 * is strict). Only the `InputCollector` builds drafts; the later stages see a
 * frozen snapshot.
 */
export type Draft = RawInput;

/** Check whether a value counts as "not entered" (`undefined`, `null`, blank string, or empty array). */
export function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}
