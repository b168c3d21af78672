import { createHash } from 'node:crypto';
import { beforeEach, describe, expect, it } from 'vitest';

import { DigestCredentialHasher } from '../src/lib/credential-hasher';
import { JwtTokenIssuer } from '../src/lib/token-issuer';
import { SessionManager } from '../src/services/session-manager';
import { TEST_JWT_SECRET } from './helpers';
import { InMemoryIdentityStore } from './in-memory-identity-store';
import { FakeClock, ScriptedSecretGenerator } from './stubs';

const CONTEXT = { ipAddress: '203.0.113.7', userAgent: 'vitest' };

describe('SessionManager', () => {
  let store: InMemoryIdentityStore;
  let clock: FakeClock;
  let sessions: SessionManager;
  let accountId: string;

  beforeEach(async () => {
    store = new InMemoryIdentityStore();
    clock = new FakeClock();
    const secrets = new ScriptedSecretGenerator();
    sessions = new SessionManager({
      hasher: new DigestCredentialHasher(),
      tokenIssuer: new JwtTokenIssuer({
        secret: TEST_JWT_SECRET,
        accessTokenTtlSeconds: 900,
        clock,
        secrets,
      }),
      clock,
      refreshTokenTtlSeconds: 3600,
    });

    accountId = await store.runAtomic(async (uow) => {
      const account = await uow.accounts.create({ role: 'USER', status: 'ACTIVE' });
      return account.id;
    });
  });

  const start = () => store.runAtomic((uow) => sessions.startSession(uow, accountId, CONTEXT));

  it('stores a hashed refresh token with the request context', async () => {
    const started = await start();

    expect(started.refreshToken).toBe('refresh-token-1');
    expect(started.record).toMatchObject({
      accountId,
      tokenHash: createHash('sha256').update('refresh-token-1').digest('hex'),
      ipAddress: '203.0.113.7',
      userAgent: 'vitest',
      revokedAt: null,
      expiresAt: new Date('2026-01-15T13:00:00.000Z'),
    });
  });

  it('revokes the previous token when a new session starts', async () => {
    const first = await start();
    clock.advance(10);
    const second = await start();

    const rows = store.rows('refreshTokens');
    const previous = rows.find((row) => row.id === first.record.id);
    const current = rows.find((row) => row.id === second.record.id);

    expect(previous?.revokedAt).toEqual(new Date('2026-01-15T12:00:10.000Z'));
    expect(current?.revokedAt).toBeNull();
    expect(rows.filter((row) => row.revokedAt === null)).toHaveLength(1);
  });

  it('validates an active token', async () => {
    const started = await start();

    const validated = await store.runAtomic((uow) => sessions.validate(uow, 'refresh-token-1'));

    expect(validated).toEqual({ accountId, tokenId: started.record.id });
  });

  it('rejects unknown, revoked and expired tokens', async () => {
    const started = await start();

    await expect(
      store.runAtomic((uow) => sessions.validate(uow, 'refresh-token-404')),
    ).rejects.toMatchObject({ kind: 'invalid_token', code: 'IDENTITY_INVALID_TOKEN' });

    clock.advance(3600);
    await expect(
      store.runAtomic((uow) => sessions.validate(uow, 'refresh-token-1')),
    ).rejects.toMatchObject({ code: 'IDENTITY_INVALID_TOKEN' });

    await store.runAtomic((uow) => sessions.revoke(uow, started.record.id));
    await expect(
      store.runAtomic((uow) => sessions.validate(uow, 'refresh-token-1')),
    ).rejects.toMatchObject({ code: 'IDENTITY_INVALID_TOKEN' });
  });

  it('revokes a token only once', async () => {
    const started = await start();

    await store.runAtomic((uow) => sessions.revoke(uow, started.record.id));

    await expect(
      store.runAtomic((uow) => sessions.revoke(uow, started.record.id)),
    ).rejects.toMatchObject({ kind: 'not_found', code: 'IDENTITY_SESSION_NOT_FOUND' });
  });

  it('revokes every active token of the account', async () => {
    await start();

    expect(await store.runAtomic((uow) => sessions.revokeAll(uow, accountId))).toBe(1);
    expect(await store.runAtomic((uow) => sessions.revokeAll(uow, accountId))).toBe(0);
  });

  it('finds a presented token whether or not it is revoked', async () => {
    const started = await start();
    await store.runAtomic((uow) => sessions.revoke(uow, started.record.id));

    const found = await store.runAtomic((uow) => sessions.find(uow, 'refresh-token-1'));
    const missing = await store.runAtomic((uow) => sessions.find(uow, 'refresh-token-404'));

    expect(found?.id).toBe(started.record.id);
    expect(found?.revokedAt).toEqual(clock.now());
    expect(missing).toBeNull();
  });
});
