import type { FieldDefinition } from './FieldDefinition.js';

/** Top-level schema definition for a form. */
export interface FormSchema {
  /** Ordered list of field definitions. Validation errors follow this order. */
  readonly fields: readonly FieldDefinition[];
  /** When `true`, input keys that match no field are kept and reported as `unknownField` errors. */
  readonly strict?: boolean;
}

/** Throw when a schema declares the same field name (or alias) twice. */
export function assertUniqueFieldNames(schema: FormSchema): void {
  const seen = new Set<string>();

  for (const field of schema.fields) {
    for (const key of [field.name, ...(field.aliases ?? [])]) {
      const lower = key.toLowerCase();
      if (seen.has(lower)) {
        throw new Error(`Form schema declares '${key}' more than once`);
      }
      seen.add(lower);
    }
  }
}
