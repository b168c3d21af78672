import { beforeEach, describe, expect, it } from 'vitest';

import { UniqueConstraintError } from '../src/errors';
import { VerificationCodeEngine } from '../src/services/verification-code-engine';
import { createTestCodeHasher } from './helpers';
import { InMemoryIdentityStore } from './in-memory-identity-store';
import { FakeClock, ScriptedSecretGenerator } from './stubs';

describe('VerificationCodeEngine', () => {
  let store: InMemoryIdentityStore;
  let clock: FakeClock;
  let secrets: ScriptedSecretGenerator;
  let engine: VerificationCodeEngine;
  let authMethodId: string;

  beforeEach(async () => {
    store = new InMemoryIdentityStore();
    clock = new FakeClock();
    secrets = new ScriptedSecretGenerator();
    engine = new VerificationCodeEngine({
      hasher: createTestCodeHasher(),
      secrets,
      clock,
      codeLength: 6,
      defaultTtlSeconds: 300,
      maxAttempts: 3,
    });

    authMethodId = await store.runAtomic(async (uow) => {
      const account = await uow.accounts.create({ role: 'USER', status: 'PENDING' });
      const method = await uow.authMethods.create({
        accountId: account.id,
        provider: 'EMAIL',
        providerId: 'casey@example.com',
        isVerified: false,
      });
      return method.id;
    });
  });

  const issue = (ttlSeconds?: number) =>
    store.runAtomic((uow) => engine.issue(uow, authMethodId, ttlSeconds));

  const validate = (code: string) =>
    store.runAtomic((uow) => engine.validate(uow, authMethodId, code));

  it('issues a code and stores only its hash', async () => {
    const issued = await issue();

    expect(issued.code).toBe('123456');
    expect(issued.expiresAt).toEqual(new Date('2026-01-15T12:05:00.000Z'));

    const [stored] = store.rows('verificationCodes');
    expect(stored.codeHash).not.toBe('123456');
    expect(stored.codeHash.startsWith('$argon2id$')).toBe(true);
    expect(stored.attempts).toBe(0);
    expect(stored.consumedAt).toBeNull();
  });

  it('honours a custom ttl', async () => {
    const issued = await issue(60);

    expect(issued.expiresAt).toEqual(new Date('2026-01-15T12:01:00.000Z'));
  });

  it('replaces the unconsumed code when issuing again', async () => {
    secrets.queueCodes('111111', '222222');
    await issue();
    const second = await issue();

    const rows = store.rows('verificationCodes');
    expect(rows).toHaveLength(1);
    expect(rows[0].id).toBe(second.record.id);

    expect(await validate('111111')).toEqual({ status: 'rejected', reason: 'mismatch', attempts: 1 });
    expect((await validate('222222')).status).toBe('accepted');
  });

  it('consumes a matching code exactly once', async () => {
    await issue();

    const check = await validate('123456');

    expect(check.status).toBe('accepted');
    expect(store.rows('verificationCodes')[0].consumedAt).toEqual(clock.now());
    expect(await validate('123456')).toEqual({ status: 'rejected', reason: 'missing', attempts: 0 });
  });

  it('counts a mismatch and commits the new attempt count', async () => {
    await issue();

    const check = await validate('000000');

    expect(check).toEqual({ status: 'rejected', reason: 'mismatch', attempts: 1 });
    expect(store.rows('verificationCodes')[0].attempts).toBe(1);
  });

  it('rejects an expired code without counting an attempt', async () => {
    await issue();
    clock.advance(300);

    const check = await validate('123456');

    expect(check).toEqual({ status: 'rejected', reason: 'expired', attempts: 0 });
    expect(store.rows('verificationCodes')[0]).toMatchObject({ attempts: 0, consumedAt: null });
  });

  it('locks the code once the attempts reach the maximum', async () => {
    await issue();

    await validate('000000');
    await validate('000000');
    expect(await validate('000000')).toEqual({
      status: 'rejected',
      reason: 'mismatch',
      attempts: 3,
    });

    expect(await validate('123456')).toEqual({ status: 'rejected', reason: 'locked', attempts: 3 });
    expect(store.rows('verificationCodes')[0]).toMatchObject({ attempts: 3, consumedAt: null });
  });

  it('leaves exactly one unconsumed code when two issues race', async () => {
    const results = await Promise.allSettled([issue(), issue()]);

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.flatMap((result) =>
      result.status === 'rejected' ? [result.reason] : [],
    );

    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(UniqueConstraintError);
    expect(rejected[0]).toMatchObject({ constraint: 'verification_codes_one_unconsumed_idx' });
    expect(store.rows('verificationCodes')).toHaveLength(1);
  });
});
