import { isActiveToken, type RefreshTokenRecord, type RequestContext } from '../domain/models';
import { notFound, invalidToken } from '../errors';
import { addSeconds, type Clock } from '../lib/clock';
import type { CredentialHasher } from '../lib/credential-hasher';
import type { TokenIssuer } from '../lib/token-issuer';
import type { UnitOfWork } from '../repositories/identity-repository';

export interface SessionManagerOptions {
  hasher: CredentialHasher;
  tokenIssuer: TokenIssuer;
  clock: Clock;
  refreshTokenTtlSeconds: number;
}

export interface StartedSession {
  refreshToken: string;
  record: RefreshTokenRecord;
}

export interface ValidatedSession {
  accountId: string;
  tokenId: string;
}

export class SessionManager {
  constructor(private readonly options: SessionManagerOptions) {}

  /**
   * Revokes every unrevoked token of the account, then inserts the new one,
   * all inside the caller's unit of work. Call only after authentication
   * succeeded.
   */
  async startSession(
    uow: UnitOfWork,
    accountId: string,
    context: RequestContext,
  ): Promise<StartedSession> {
    const now = this.options.clock.now();

    await uow.refreshTokens.revokeAllForAccount(accountId, now);

    const refreshToken = this.options.tokenIssuer.mintRefreshSecret();
    const tokenHash = await this.options.hasher.hash(refreshToken);

    const record = await uow.refreshTokens.create({
      accountId,
      tokenHash,
      ipAddress: context.ipAddress ?? null,
      userAgent: context.userAgent ?? null,
      expiresAt: addSeconds(now, this.options.refreshTokenTtlSeconds),
      createdAt: now,
    });

    return { refreshToken, record };
  }

  async revoke(uow: UnitOfWork, tokenId: string) {
    const revoked = await uow.refreshTokens.revoke(tokenId, this.options.clock.now());
    if (!revoked) {
      throw notFound('IDENTITY_SESSION_NOT_FOUND', 'Session not found.');
    }
  }

  async revokeAll(uow: UnitOfWork, accountId: string) {
    return uow.refreshTokens.revokeAllForAccount(accountId, this.options.clock.now());
  }

  async validate(uow: UnitOfWork, refreshToken: string): Promise<ValidatedSession> {
    const tokenHash = await this.options.hasher.hash(refreshToken);
    const record = await uow.refreshTokens.findByHash(tokenHash);

    if (!record || !isActiveToken(record, this.options.clock.now())) {
      throw invalidToken();
    }

    if (!(await this.options.hasher.compare(refreshToken, record.tokenHash))) {
      throw invalidToken();
    }

    return { accountId: record.accountId, tokenId: record.id };
  }

  /** Resolves a presented token to its row, revoked or not; null when unknown. */
  async find(uow: UnitOfWork, refreshToken: string) {
    const tokenHash = await this.options.hasher.hash(refreshToken);
    return uow.refreshTokens.findByHash(tokenHash);
  }
}
