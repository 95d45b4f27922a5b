import { createHash } from 'node:crypto';
import type { HashPolicy, SecretHasher } from '../../domain/ports/SecretHasher.js';

export interface Sha256SecretHasherOptions {
  /** Application-wide secret prepended to every value before hashing. Default: `''`. */
  readonly pepper?: string;
}

/** Deterministic hasher: lower-case hex SHA-256 of `pepper + secret`. */
export class Sha256SecretHasher implements SecretHasher {
  readonly policy: HashPolicy = 'deterministic';
  private readonly pepper: string;

  constructor(options?: Sha256SecretHasherOptions) {
    this.pepper = options?.pepper ?? '';
  }

  hash(secret: string): Promise<string> {
    return Promise.resolve(
      createHash('sha256')
        .update(this.pepper + secret, 'utf8')
        .digest('hex'),
    );
  }
}
