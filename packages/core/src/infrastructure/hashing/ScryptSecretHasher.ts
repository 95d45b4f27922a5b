import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import type { HashPolicy, SecretHasher } from '../../domain/ports/SecretHasher.js';

export interface ScryptSecretHasherOptions {
  /** CPU/memory cost parameter (N). Must be a power of two. Default: `16384`. */
  readonly cost?: number;
  /** Derived key length in bytes. Default: `32`. */
  readonly keyLength?: number;
  /** Random salt length in bytes. Default: `16`. */
  readonly saltBytes?: number;
}

function derive(secret: string, salt: Buffer, keyLength: number, cost: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(secret, salt, keyLength, { N: cost }, (error, derivedKey) => {
      if (error) {
        reject(error);
      } else {
        resolve(derivedKey);
      }
    });
  });
}

/**
 * Salted hasher. Output format: `scrypt$<cost>$<salt base64>$<key base64>`.
 *
 * Every call draws a fresh salt, so hashing the same secret twice gives two
 * different strings; use `verify()` to compare.
 */
export class ScryptSecretHasher implements SecretHasher {
  readonly policy: HashPolicy = 'salted';
  private readonly cost: number;
  private readonly keyLength: number;
  private readonly saltBytes: number;

  constructor(options?: ScryptSecretHasherOptions) {
    this.cost = options?.cost ?? 16384;
    this.keyLength = options?.keyLength ?? 32;
    this.saltBytes = options?.saltBytes ?? 16;
  }

  async hash(secret: string): Promise<string> {
    const salt = randomBytes(this.saltBytes);
    const key = await derive(secret, salt, this.keyLength, this.cost);
    return ['scrypt', String(this.cost), salt.toString('base64'), key.toString('base64')].join('$');
  }

  /** Check a secret against a hash produced by `hash()`. Malformed hashes never match. */
  async verify(secret: string, hashed: string): Promise<boolean> {
    const [scheme, cost, salt, key] = hashed.split('$');
    if (scheme !== 'scrypt' || cost === undefined || salt === undefined || key === undefined) return false;

    const expected = Buffer.from(key, 'base64');
    const parsedCost = Number(cost);
    if (!Number.isInteger(parsedCost) || expected.length === 0) return false;

    const actual = await derive(secret, Buffer.from(salt, 'base64'), expected.length, parsedCost);
    return timingSafeEqual(actual, expected);
  }
}
