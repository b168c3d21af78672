import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

import { ACCOUNT_STATUSES, ROLES, type AccessTokenClaims } from '../domain/models';
import { invalidToken } from '../errors';
import { addSeconds, type Clock } from './clock';
import type { SecretGenerator } from './secrets';

export const ACCESS_TOKEN_AUDIENCE = 'identity-clients';
export const ACCESS_TOKEN_ISSUER = 'identity-service';
const REFRESH_SECRET_BYTES = 48;

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
  status: z.enum(ACCOUNT_STATUSES),
});

export interface SignedAccessToken {
  token: string;
  expiresAt: Date;
}

export interface TokenIssuer {
  signAccessToken(claims: AccessTokenClaims): SignedAccessToken;
  verifyAccessToken(token: string): AccessTokenClaims;
  mintRefreshSecret(): string;
}

export interface JwtTokenIssuerOptions {
  secret: string;
  accessTokenTtlSeconds: number;
  clock: Clock;
  secrets: SecretGenerator;
}

export class JwtTokenIssuer implements TokenIssuer {
  constructor(private readonly options: JwtTokenIssuerOptions) {}

  signAccessToken(claims: AccessTokenClaims): SignedAccessToken {
    const issuedAt = this.options.clock.now();
    const ttl = this.options.accessTokenTtlSeconds;

    const token = jwt.sign(
      {
        sub: claims.sub,
        role: claims.role,
        status: claims.status,
        iat: Math.floor(issuedAt.getTime() / 1000),
      },
      this.options.secret,
      {
        algorithm: 'HS256',
        issuer: ACCESS_TOKEN_ISSUER,
        audience: ACCESS_TOKEN_AUDIENCE,
        expiresIn: ttl,
      },
    );

    return { token, expiresAt: addSeconds(issuedAt, ttl) };
  }

  verifyAccessToken(token: string): AccessTokenClaims {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        issuer: ACCESS_TOKEN_ISSUER,
        audience: ACCESS_TOKEN_AUDIENCE,
        clockTimestamp: Math.floor(this.options.clock.now().getTime() / 1000),
      });
    } catch {
      throw invalidToken('AUTH_UNAUTHORIZED', 'Authentication required.');
    }

    const parsed = ClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw invalidToken('AUTH_UNAUTHORIZED', 'Authentication required.');
    }

    return parsed.data;
  }

  mintRefreshSecret() {
    return this.options.secrets.opaqueToken(REFRESH_SECRET_BYTES);
  }
}
