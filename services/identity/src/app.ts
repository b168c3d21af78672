import fastify, { type FastifyServerOptions } from 'fastify';
import sensible from '@fastify/sensible';
import cookie from '@fastify/cookie';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Pool } from 'pg';

import { env as defaultEnv, type Env } from './env';
import { ServiceError } from './errors';
import { LogEventPublisher, type EventPublisher } from './events/event-publisher';
import { systemClock, type Clock } from './lib/clock';
import type { CredentialHasher } from './lib/credential-hasher';
import { randomSecretGenerator, type SecretGenerator } from './lib/secrets';
import { JwtTokenIssuer } from './lib/token-issuer';
import authzPlugin from './plugins/authz';
import pgPlugin from './plugins/pg';
import validationPlugin from './plugins/validation';
import type { TransactionCoordinator } from './repositories/identity-repository';
import { PgTransactionCoordinator } from './repositories/pg/pg-transaction-coordinator';
import { identityRoutes } from './routes/identity-routes';
import { IdentityService } from './services/identity-service';

export interface BuildAppOptions {
  env?: Env;
  /** Replaces the PostgreSQL coordinator; no pool is opened when set. */
  coordinator?: TransactionCoordinator;
  pool?: Pool;
  events?: EventPublisher;
  clock?: Clock;
  secrets?: SecretGenerator;
  codeHasher?: CredentialHasher;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(options: BuildAppOptions = {}) {
  const resolvedEnv = options.env ?? defaultEnv;
  const clock = options.clock ?? systemClock;
  const secrets = options.secrets ?? randomSecretGenerator;

  const app = fastify({
    logger: options.logger ?? { level: resolvedEnv.LOG_LEVEL },
  });

  await app.register(sensible);
  await app.register(cors, {
    origin: true,
    credentials: true,
  });
  await app.register(helmet);
  await app.register(rateLimit, {
    max: resolvedEnv.RATE_LIMIT_MAX,
    timeWindow: `${resolvedEnv.RATE_LIMIT_WINDOW_MINUTES} minutes`,
  });
  await app.register(cookie);

  let coordinator = options.coordinator;
  if (!coordinator) {
    await app.register(pgPlugin, {
      connectionString: resolvedEnv.DATABASE_URL,
      max: resolvedEnv.DATABASE_POOL_MAX,
      pool: options.pool,
    });
    coordinator = new PgTransactionCoordinator(app.pg, app.log);
  }

  const tokenIssuer = new JwtTokenIssuer({
    secret: resolvedEnv.JWT_ACCESS_SECRET,
    accessTokenTtlSeconds: resolvedEnv.ACCESS_TOKEN_TTL_SECONDS,
    clock,
    secrets,
  });

  const identityService = new IdentityService({
    coordinator,
    tokenIssuer,
    events: options.events ?? new LogEventPublisher(app.log),
    logger: app.log,
    env: resolvedEnv,
    clock,
    secrets,
    codeHasher: options.codeHasher,
  });

  app.decorate('tokenIssuer', tokenIssuer);
  app.decorate('identityService', identityService);

  await app.register(validationPlugin);
  await app.register(authzPlugin);
  await app.register(identityRoutes, { env: resolvedEnv });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ServiceError) {
      request.log.warn({ err: error }, 'Handled service error');
      return reply.code(error.status).send({
        error: {
          code: error.code,
          message: error.message,
          details: error.details ?? null,
        },
        correlationId: request.id,
      });
    }

    // rate limiting and malformed bodies arrive as Fastify errors with a 4xx status
    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      request.log.warn({ err: error }, 'Rejected request');
      return reply.code(error.statusCode).send({
        error: {
          code: error.code ?? 'BAD_REQUEST',
          message: error.message,
        },
        correlationId: request.id,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred.',
      },
      correlationId: request.id,
    });
  });

  return app;
}
