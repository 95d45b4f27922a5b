/**
 * `deterministic`: the same secret always hashes to the same string.
 * `salted`: every call uses a fresh salt, so hashes differ between calls.
 */
export type HashPolicy = 'deterministic' | 'salted';

/** Port for one-way hashing of secret fields during the transform stage. */
export interface SecretHasher {
  readonly policy: HashPolicy;
  hash(secret: string): Promise<string>;
}
