import argon2, { type Options as Argon2Options } from 'argon2';
import crypto from 'node:crypto';

export interface CredentialHasher {
  hash(plainText: string): Promise<string>;
  /** Constant-time comparison of `plainText` against a stored hash. */
  compare(plainText: string, hash: string): Promise<boolean>;
}

const ARGON2_OPTIONS: Argon2Options = {
  type: argon2.argon2id,
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

/** Salted argon2id hashing for short one-time codes. */
export class Argon2CredentialHasher implements CredentialHasher {
  constructor(private readonly options: Argon2Options = ARGON2_OPTIONS) {}

  async hash(plainText: string) {
    return argon2.hash(plainText, this.options);
  }

  async compare(plainText: string, hash: string) {
    try {
      return await argon2.verify(hash, plainText);
    } catch {
      // argon2 throws on a malformed stored hash; treat it as a mismatch.
      return false;
    }
  }
}

/**
 * Unsalted SHA-256 for high-entropy opaque secrets. Deterministic, so a
 * presented refresh token can be looked up by its hash.
 */
export class DigestCredentialHasher implements CredentialHasher {
  async hash(plainText: string) {
    return crypto.createHash('sha256').update(plainText, 'utf8').digest('hex');
  }

  async compare(plainText: string, hash: string) {
    const expected = Buffer.from(hash, 'hex');
    const actual = crypto.createHash('sha256').update(plainText, 'utf8').digest();

    if (expected.length !== actual.length) {
      return false;
    }

    return crypto.timingSafeEqual(expected, actual);
  }
}
