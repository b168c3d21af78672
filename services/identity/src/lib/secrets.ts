import crypto from 'node:crypto';

export interface SecretGenerator {
  /** Zero-padded decimal code of exactly `length` digits. */
  numericCode(length: number): string;
  opaqueToken(bytes: number): string;
}

export const randomSecretGenerator: SecretGenerator = {
  numericCode(length) {
    const upper = 10 ** length;
    return crypto.randomInt(0, upper).toString().padStart(length, '0');
  },
  opaqueToken(bytes) {
    return crypto.randomBytes(bytes).toString('base64url');
  },
};
