import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import type { Account, AuthMethod, RequestContext } from '../domain/models';
import type { Env } from '../env';
import { badRequest } from '../errors';
import { SESSION_COOKIE } from '../plugins/authz';
import type { AuthTokens } from '../services/identity-service';

export const REFRESH_COOKIE = 'idn_refresh';

// GOOGLE identities are bound by trusted callers through IdentityService only.
const IdentitySchema = z
  .object({
    provider: z.literal('EMAIL'),
    externalId: z.string().email().max(254),
  })
  .strict();

const IdentityCodeSchema = IdentitySchema.extend({
  code: z.string().regex(/^\d{4,10}$/, 'Code must be 4 to 10 digits'),
}).strict();

const RefreshTokenSchema = z
  .object({
    refreshToken: z.string().min(1).max(512).optional(),
  })
  .strict();

export interface IdentityRoutesOptions {
  env: Pick<Env, 'COOKIE_DOMAIN' | 'COOKIE_SECURE'>;
}

export const identityRoutes: FastifyPluginAsync<IdentityRoutesOptions> = async (fastify, opts) => {
  const { env } = opts;

  fastify.get('/health', async (request) => ({
    status: 'ok',
    correlationId: request.id,
  }));

  fastify.post(
    '/api/identity/register',
    fastify.withValidation({ body: IdentitySchema }, async (request, reply) => {
      const result = await fastify.identityService.register(request.validated.body, {
        signal: abortOnDisconnect(reply),
      });

      return reply.code(201).send({
        data: {
          account: serializeAccount(result.account),
          authMethod: serializeAuthMethod(result.authMethod),
          requiresVerification: result.requiresVerification,
          verificationExpiresAt: result.verificationExpiresAt?.toISOString() ?? null,
          debug: result.debug,
        },
        meta: {},
      });
    }),
  );

  fastify.post(
    '/api/identity/verify',
    fastify.withValidation({ body: IdentityCodeSchema }, async (request, reply) => {
      const result = await fastify.identityService.verifyCode(
        request.validated.body,
        buildContext(request),
        { signal: abortOnDisconnect(reply) },
      );
      setAuthCookies(reply, env, result.tokens);

      return reply.code(200).send({
        data: {
          account: serializeAccount(result.account),
          session: serializeSession(result.tokens),
        },
        meta: {},
      });
    }),
  );

  fastify.post(
    '/api/identity/login/code',
    fastify.withValidation({ body: IdentitySchema }, async (request, reply) => {
      const result = await fastify.identityService.requestLoginCode(request.validated.body, {
        signal: abortOnDisconnect(reply),
      });

      return reply.code(202).send({
        data: {
          expiresAt: result.expiresAt.toISOString(),
          expiresInSeconds: result.expiresInSeconds,
          debug: result.debug,
        },
        meta: {},
      });
    }),
  );

  fastify.post(
    '/api/identity/login',
    fastify.withValidation({ body: IdentityCodeSchema }, async (request, reply) => {
      const result = await fastify.identityService.completeLogin(
        request.validated.body,
        buildContext(request),
        { signal: abortOnDisconnect(reply) },
      );
      setAuthCookies(reply, env, result.tokens);

      return reply.code(200).send({
        data: {
          account: serializeAccount(result.account),
          session: serializeSession(result.tokens),
        },
        meta: {},
      });
    }),
  );

  fastify.post(
    '/api/identity/refresh',
    fastify.withValidation({ body: RefreshTokenSchema }, async (request, reply) => {
      const refreshToken = resolveRefreshToken(request, request.validated.body.refreshToken);

      const result = await fastify.identityService.refreshSession(
        refreshToken,
        buildContext(request),
        { signal: abortOnDisconnect(reply) },
      );
      setAuthCookies(reply, env, result.tokens);

      return reply.code(200).send({
        data: {
          account: serializeAccount(result.account),
          session: serializeSession(result.tokens),
        },
        meta: {},
      });
    }),
  );

  fastify.post(
    '/api/identity/logout',
    fastify.withValidation({ body: RefreshTokenSchema }, async (request, reply) => {
      const refreshToken = resolveRefreshToken(request, request.validated.body.refreshToken);

      await fastify.identityService.logout(refreshToken, { signal: abortOnDisconnect(reply) });
      clearAuthCookies(reply, env);

      return reply.code(204).send();
    }),
  );

  fastify.post('/api/identity/logout/all', async (request, reply) => {
    const account = await fastify.authenticate(request);

    await fastify.identityService.logoutAll(account.id, { signal: abortOnDisconnect(reply) });
    clearAuthCookies(reply, env);

    return reply.code(204).send();
  });

  fastify.get('/api/identity/me', async (request, reply) => {
    const account = await fastify.authenticate(request);

    return reply.send({
      data: {
        account: serializeAccount(account),
      },
      meta: {},
    });
  });
};

function resolveRefreshToken(request: FastifyRequest, fromBody: string | undefined) {
  const refreshToken = fromBody ?? request.cookies?.[REFRESH_COOKIE];

  if (!refreshToken) {
    throw badRequest('IDENTITY_MISSING_REFRESH_TOKEN', 'Refresh token not provided.');
  }

  return refreshToken;
}

/** Aborts the unit of work when the client goes away before the response is written. */
function abortOnDisconnect(reply: FastifyReply) {
  const controller = new AbortController();

  reply.raw.once('close', () => {
    if (!reply.raw.writableEnded) {
      controller.abort();
    }
  });

  return controller.signal;
}

function buildContext(request: FastifyRequest): RequestContext {
  return {
    ipAddress: request.ip ?? null,
    userAgent: request.headers['user-agent'] ?? null,
  };
}

function serializeAccount(account: Account) {
  return {
    id: account.id,
    role: account.role,
    status: account.status,
    createdAt: account.createdAt.toISOString(),
  };
}

function serializeAuthMethod(method: AuthMethod) {
  return {
    id: method.id,
    provider: method.provider,
    providerId: method.providerId,
    isVerified: method.isVerified,
    lastLoginAt: method.lastLoginAt ? method.lastLoginAt.toISOString() : null,
  };
}

function serializeSession(tokens: AuthTokens) {
  return {
    accessToken: tokens.accessToken,
    accessTokenExpiresAt: tokens.accessTokenExpiresAt.toISOString(),
    refreshToken: tokens.refreshToken,
    refreshTokenExpiresAt: tokens.refreshTokenExpiresAt.toISOString(),
  };
}

function setAuthCookies(reply: FastifyReply, env: IdentityRoutesOptions['env'], tokens: AuthTokens) {
  reply.setCookie(SESSION_COOKIE, tokens.accessToken, {
    httpOnly: true,
    sameSite: 'lax',
    secure: env.COOKIE_SECURE,
    domain: env.COOKIE_DOMAIN,
    path: '/',
    expires: tokens.accessTokenExpiresAt,
  });

  reply.setCookie(REFRESH_COOKIE, tokens.refreshToken, {
    httpOnly: true,
    sameSite: 'lax',
    secure: env.COOKIE_SECURE,
    domain: env.COOKIE_DOMAIN,
    path: '/api/identity',
    expires: tokens.refreshTokenExpiresAt,
  });
}

function clearAuthCookies(reply: FastifyReply, env: IdentityRoutesOptions['env']) {
  reply.setCookie(SESSION_COOKIE, '', {
    httpOnly: true,
    sameSite: 'lax',
    secure: env.COOKIE_SECURE,
    domain: env.COOKIE_DOMAIN,
    path: '/',
    maxAge: 0,
  });

  reply.setCookie(REFRESH_COOKIE, '', {
    httpOnly: true,
    sameSite: 'lax',
    secure: env.COOKIE_SECURE,
    domain: env.COOKIE_DOMAIN,
    path: '/api/identity',
    maxAge: 0,
  });
}
