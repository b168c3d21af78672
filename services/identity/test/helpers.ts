import argon2 from 'argon2';
import pino from 'pino';

import type { Env } from '../src/env';
import { Argon2CredentialHasher } from '../src/lib/credential-hasher';
import { JwtTokenIssuer } from '../src/lib/token-issuer';
import { IdentityService, type IdentityEnv } from '../src/services/identity-service';
import { InMemoryIdentityStore } from './in-memory-identity-store';
import { FakeClock, RecordingEventPublisher, ScriptedSecretGenerator } from './stubs';

export const TEST_JWT_SECRET = 'test-secret-test-secret-test-secret';

export const silentLogger = pino({ level: 'silent' });

/** Cheap argon2id parameters; the production defaults cost ~50 ms a hash. */
export function createTestCodeHasher() {
  return new Argon2CredentialHasher({
    type: argon2.argon2id,
    memoryCost: 4096,
    timeCost: 2,
    parallelism: 1,
  });
}

export function buildTestEnv(overrides: Partial<Env> = {}): Env {
  return {
    NODE_ENV: 'test',
    PORT: 4010,
    HOST: '127.0.0.1',
    LOG_LEVEL: 'silent',
    DATABASE_URL: 'postgres://localhost:5432/identity_test',
    DATABASE_POOL_MAX: 2,
    DATABASE_APPLY_SCHEMA: false,
    JWT_ACCESS_SECRET: TEST_JWT_SECRET,
    ACCESS_TOKEN_TTL_SECONDS: 900,
    REFRESH_TOKEN_TTL_SECONDS: 60 * 60 * 24 * 30,
    VERIFICATION_CODE_TTL_SECONDS: 300,
    VERIFICATION_CODE_LENGTH: 6,
    VERIFICATION_MAX_ATTEMPTS: 5,
    UNIT_OF_WORK_TIMEOUT_MS: 5_000,
    COOKIE_DOMAIN: undefined,
    COOKIE_SECURE: false,
    RATE_LIMIT_MAX: 1_000,
    RATE_LIMIT_WINDOW_MINUTES: 1,
    isProduction: false,
    ...overrides,
  };
}

export function createIdentityServiceForTest(overrides: Partial<IdentityEnv> = {}) {
  const env = buildTestEnv(overrides);
  const store = new InMemoryIdentityStore();
  const events = new RecordingEventPublisher();
  const clock = new FakeClock();
  const secrets = new ScriptedSecretGenerator();

  const tokenIssuer = new JwtTokenIssuer({
    secret: TEST_JWT_SECRET,
    accessTokenTtlSeconds: env.ACCESS_TOKEN_TTL_SECONDS,
    clock,
    secrets,
  });

  const service = new IdentityService({
    coordinator: store,
    tokenIssuer,
    events,
    logger: silentLogger,
    env,
    clock,
    secrets,
    codeHasher: createTestCodeHasher(),
  });

  return { service, store, events, clock, secrets, tokenIssuer, env };
}

/** Registers an EMAIL identity and verifies it with the scripted code. */
export async function registerVerifiedEmail(
  context: ReturnType<typeof createIdentityServiceForTest>,
  email = 'casey@example.com',
) {
  const registered = await context.service.register({ provider: 'EMAIL', externalId: email });
  const verified = await context.service.verifyCode(
    { provider: 'EMAIL', externalId: email, code: '123456' },
    { ipAddress: '127.0.0.1', userAgent: 'vitest' },
  );

  return { registered, verified };
}
