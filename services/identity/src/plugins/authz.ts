import fp from 'fastify-plugin';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';

import type { Account } from '../domain/models';
import { invalidAccountState, invalidToken, ServiceError } from '../errors';

export const SESSION_COOKIE = 'idn_session';

function extractAccessToken(request: FastifyRequest) {
  const header = request.headers.authorization;
  if (typeof header === 'string') {
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (match) {
      return match[1].trim();
    }
  }

  const cookieToken = request.cookies?.[SESSION_COOKIE];
  return typeof cookieToken === 'string' && cookieToken.length > 0 ? cookieToken : null;
}

function unauthorized() {
  return invalidToken('AUTH_UNAUTHORIZED', 'Authentication required.');
}

const authzPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('authAccount', null);

  fastify.decorate('authenticate', async function authenticate(request: FastifyRequest) {
    const token = extractAccessToken(request);

    if (!token) {
      throw unauthorized();
    }

    const claims = fastify.tokenIssuer.verifyAccessToken(token);

    let account: Account;
    try {
      account = await fastify.identityService.getAccount(claims.sub);
    } catch (error) {
      if (error instanceof ServiceError && error.kind === 'not_found') {
        throw unauthorized();
      }

      throw error;
    }

    // the token carries the status at issue time; the stored one wins
    if (account.status !== 'ACTIVE') {
      throw invalidAccountState();
    }

    request.authAccount = account;
    return account;
  });
};

export default fp(authzPlugin, {
  name: 'authz-plugin',
});
