import type { FastifyRequest, RouteHandlerMethod } from 'fastify';
import type { Pool } from 'pg';

import type { Account } from '../domain/models';
import type { TokenIssuer } from '../lib/token-issuer';
import type { ValidationHandler, ValidationSchemas } from '../plugins/validation';
import type { IdentityService } from '../services/identity-service';

declare module 'fastify' {
  interface FastifyInstance {
    pg: Pool;
    identityService: IdentityService;
    tokenIssuer: TokenIssuer;
    withValidation<T extends ValidationSchemas>(
      schemas: T,
      handler: ValidationHandler<T>,
    ): RouteHandlerMethod;
    authenticate(request: FastifyRequest): Promise<Account>;
  }

  interface FastifyRequest {
    authAccount: Account | null;
    validated: Record<string, unknown>;
  }
}
