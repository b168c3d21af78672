import type { VerificationCodeRecord } from '../domain/models';
import { addSeconds, type Clock } from '../lib/clock';
import type { CredentialHasher } from '../lib/credential-hasher';
import type { SecretGenerator } from '../lib/secrets';
import type { UnitOfWork } from '../repositories/identity-repository';

export interface VerificationCodeEngineOptions {
  hasher: CredentialHasher;
  secrets: SecretGenerator;
  clock: Clock;
  codeLength: number;
  defaultTtlSeconds: number;
  maxAttempts: number;
}

export interface IssuedCode {
  code: string;
  expiresAt: Date;
  record: VerificationCodeRecord;
}

export type CodeRejection = 'missing' | 'expired' | 'mismatch' | 'locked';

export type CodeCheck =
  | { status: 'accepted'; record: VerificationCodeRecord }
  | { status: 'rejected'; reason: CodeRejection; attempts: number };

/**
 * Issues and checks one-time codes. At most one unconsumed code exists per
 * auth method: `issue` deletes the previous one before inserting.
 *
 * `validate` never throws for a wrong, expired or locked code. It returns a
 * `CodeCheck` so the caller can commit the attempts increment and then fail
 * the request.
 */
export class VerificationCodeEngine {
  constructor(private readonly options: VerificationCodeEngineOptions) {}

  get maxAttempts() {
    return this.options.maxAttempts;
  }

  async issue(uow: UnitOfWork, authMethodId: string, ttlSeconds?: number): Promise<IssuedCode> {
    const now = this.options.clock.now();
    const expiresAt = addSeconds(now, ttlSeconds ?? this.options.defaultTtlSeconds);

    await uow.verificationCodes.deleteUnconsumed(authMethodId);

    const code = this.options.secrets.numericCode(this.options.codeLength);
    const codeHash = await this.options.hasher.hash(code);

    const record = await uow.verificationCodes.create({
      authMethodId,
      codeHash,
      expiresAt,
      createdAt: now,
    });

    return { code, expiresAt, record };
  }

  async validate(uow: UnitOfWork, authMethodId: string, suppliedCode: string): Promise<CodeCheck> {
    const record = await uow.verificationCodes.findUnconsumed(authMethodId);

    if (!record) {
      return { status: 'rejected', reason: 'missing', attempts: 0 };
    }

    const now = this.options.clock.now();

    // expired and locked codes are rejected before the hash comparison
    if (record.expiresAt.getTime() <= now.getTime()) {
      return { status: 'rejected', reason: 'expired', attempts: record.attempts };
    }

    if (record.attempts >= this.options.maxAttempts) {
      return { status: 'rejected', reason: 'locked', attempts: record.attempts };
    }

    const matches = await this.options.hasher.compare(suppliedCode, record.codeHash);

    if (!matches) {
      const attempts = await uow.verificationCodes.incrementAttempts(record.id);
      return { status: 'rejected', reason: 'mismatch', attempts };
    }

    const consumed = await uow.verificationCodes.markConsumed(record.id, now);
    if (!consumed) {
      // consumed concurrently between the read and the update
      return { status: 'rejected', reason: 'missing', attempts: record.attempts };
    }

    return { status: 'accepted', record: { ...record, consumedAt: now } };
  }
}
