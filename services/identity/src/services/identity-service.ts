import type { FastifyBaseLogger } from 'fastify';

import type { Account, AuthMethod, AuthProvider, RequestContext } from '../domain/models';
import type { Env } from '../env';
import {
  ServiceError,
  UniqueConstraintError,
  attemptsExceeded,
  conflict,
  internal,
  invalidAccountState,
  invalidCredentials,
  invalidOrExpiredCode,
  isAbortError,
  notFound,
  requestAborted,
} from '../errors';
import { identityEvent, type EventPublisher, type IdentityEvent } from '../events/event-publisher';
import { createDeadline } from '../lib/abort';
import { systemClock, type Clock } from '../lib/clock';
import {
  Argon2CredentialHasher,
  DigestCredentialHasher,
  type CredentialHasher,
} from '../lib/credential-hasher';
import { randomSecretGenerator, type SecretGenerator } from '../lib/secrets';
import type { TokenIssuer } from '../lib/token-issuer';
import type { TransactionCoordinator, UnitOfWork } from '../repositories/identity-repository';
import { AccountLifecycle } from './account-lifecycle';
import { AuthMethodBinding } from './auth-method-binding';
import { SessionManager, type StartedSession } from './session-manager';
import { VerificationCodeEngine, type CodeCheck, type IssuedCode } from './verification-code-engine';

export type IdentityEnv = Pick<
  Env,
  | 'isProduction'
  | 'REFRESH_TOKEN_TTL_SECONDS'
  | 'VERIFICATION_CODE_TTL_SECONDS'
  | 'VERIFICATION_CODE_LENGTH'
  | 'VERIFICATION_MAX_ATTEMPTS'
  | 'UNIT_OF_WORK_TIMEOUT_MS'
>;

export interface IdentityInput {
  provider: AuthProvider;
  externalId: string;
}

export interface CodeInput extends IdentityInput {
  code: string;
}

export interface FlowOptions {
  signal?: AbortSignal;
}

export interface AuthTokens {
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken: string;
  refreshTokenExpiresAt: Date;
}

export interface RegisterResult {
  account: Account;
  authMethod: AuthMethod;
  requiresVerification: boolean;
  verificationExpiresAt: Date | null;
  debug?: {
    verificationCode: string;
  };
}

export interface AuthenticatedResult {
  account: Account;
  tokens: AuthTokens;
}

export interface LoginCodeResult {
  expiresAt: Date;
  expiresInSeconds: number;
  debug?: {
    verificationCode: string;
  };
}

export interface LogoutAllResult {
  revokedCount: number;
}

export interface IdentityServiceDependencies {
  coordinator: TransactionCoordinator;
  tokenIssuer: TokenIssuer;
  events: EventPublisher;
  logger: FastifyBaseLogger;
  env: IdentityEnv;
  clock?: Clock;
  secrets?: SecretGenerator;
  codeHasher?: CredentialHasher;
  tokenHasher?: CredentialHasher;
}

type Outcome<T> =
  | { ok: true; value: T; events: IdentityEvent[] }
  | { ok: false; error: ServiceError };

function accept<T>(value: T, events: IdentityEvent[] = []): Outcome<T> {
  return { ok: true, value, events };
}

function reject<T>(error: ServiceError): Outcome<T> {
  return { ok: false, error };
}

/**
 * Composes the identity flows. Each public method is one unit of work; events
 * go out only after it commits, and a failed publish never undoes the commit.
 *
 * Rejected verification codes are returned as an `Outcome` failure rather
 * than thrown so the attempts increment commits before the request fails.
 */
export class IdentityService {
  private readonly coordinator: TransactionCoordinator;

  private readonly tokenIssuer: TokenIssuer;

  private readonly events: EventPublisher;

  private readonly logger: FastifyBaseLogger;

  private readonly env: IdentityEnv;

  private readonly clock: Clock;

  readonly accounts = new AccountLifecycle();

  readonly authMethods = new AuthMethodBinding();

  readonly codes: VerificationCodeEngine;

  readonly sessions: SessionManager;

  constructor(dependencies: IdentityServiceDependencies) {
    this.coordinator = dependencies.coordinator;
    this.tokenIssuer = dependencies.tokenIssuer;
    this.events = dependencies.events;
    this.logger = dependencies.logger;
    this.env = dependencies.env;
    this.clock = dependencies.clock ?? systemClock;

    this.codes = new VerificationCodeEngine({
      hasher: dependencies.codeHasher ?? new Argon2CredentialHasher(),
      secrets: dependencies.secrets ?? randomSecretGenerator,
      clock: this.clock,
      codeLength: this.env.VERIFICATION_CODE_LENGTH,
      defaultTtlSeconds: this.env.VERIFICATION_CODE_TTL_SECONDS,
      maxAttempts: this.env.VERIFICATION_MAX_ATTEMPTS,
    });

    this.sessions = new SessionManager({
      hasher: dependencies.tokenHasher ?? new DigestCredentialHasher(),
      tokenIssuer: this.tokenIssuer,
      clock: this.clock,
      refreshTokenTtlSeconds: this.env.REFRESH_TOKEN_TTL_SECONDS,
    });
  }

  async register(
    input: IdentityInput,
    options: FlowOptions = {},
  ): Promise<RegisterResult> {
    return this.execute<RegisterResult>(
      'register',
      async (uow) => {
        const existing = await this.authMethods.findByProvider(
          uow,
          input.provider,
          input.externalId,
        );
        if (existing) {
          throw conflict('IDENTITY_ACCOUNT_EXISTS', 'An account already exists for this identity.');
        }

        const requiresVerification = input.provider === 'EMAIL';
        const account = await this.accounts.create(
          uow,
          'USER',
          requiresVerification ? 'PENDING' : 'ACTIVE',
        );
        const authMethod = await this.authMethods.create(
          uow,
          account.id,
          input.provider,
          input.externalId,
          !requiresVerification,
        );

        const events: IdentityEvent[] = [
          identityEvent('identity.account.registered', {
            accountId: account.id,
            authMethodId: authMethod.id,
            provider: authMethod.provider,
            status: account.status,
          }),
        ];

        let issued: IssuedCode | null = null;
        if (requiresVerification) {
          issued = await this.codes.issue(uow, authMethod.id);
          events.push(this.codeIssuedEvent(authMethod, issued, 'registration'));
        }

        return accept(
          {
            account,
            authMethod,
            requiresVerification,
            verificationExpiresAt: issued?.expiresAt ?? null,
            debug: this.debugCode(issued),
          },
          events,
        );
      },
      options,
    );
  }

  async verifyCode(
    input: CodeInput,
    context: RequestContext,
    options: FlowOptions = {},
  ): Promise<AuthenticatedResult> {
    return this.execute<AuthenticatedResult>(
      'verifyCode',
      async (uow) => {
        const method = await this.authMethods.findByProvider(uow, input.provider, input.externalId);
        if (!method) {
          throw notFound('IDENTITY_ACCOUNT_NOT_FOUND', 'Account not found.');
        }

        const account = await this.accounts.get(uow, method.accountId);
        if (account.status === 'ACTIVE') {
          throw conflict('IDENTITY_ACCOUNT_ALREADY_VERIFIED', 'The account is already verified.');
        }
        if (account.status !== 'PENDING') {
          throw invalidAccountState();
        }

        const check = await this.codes.validate(uow, method.id, input.code);
        if (check.status === 'rejected') {
          return reject(this.codeRejection(check));
        }

        await this.authMethods.markVerified(uow, method.id);
        const activated = await this.accounts.setStatus(uow, account.id, 'ACTIVE');
        const session = await this.beginSession(uow, activated, method, context);

        return accept({ account: activated, tokens: session.tokens }, [
          identityEvent('identity.account.verified', {
            accountId: activated.id,
            authMethodId: method.id,
          }),
          this.sessionStartedEvent(session.started),
        ]);
      },
      options,
    );
  }

  async requestLoginCode(
    input: IdentityInput,
    options: FlowOptions = {},
  ): Promise<LoginCodeResult> {
    return this.execute<LoginCodeResult>(
      'requestLoginCode',
      async (uow) => {
        const method = await this.authMethods.findByProvider(uow, input.provider, input.externalId);
        if (!method || method.provider !== 'EMAIL') {
          throw invalidCredentials();
        }

        const account = await this.accounts.get(uow, method.accountId);
        if (account.status !== 'ACTIVE') {
          throw invalidAccountState();
        }
        if (!method.isVerified) {
          throw invalidCredentials();
        }

        const issued = await this.codes.issue(uow, method.id);

        return accept(
          {
            expiresAt: issued.expiresAt,
            expiresInSeconds: this.env.VERIFICATION_CODE_TTL_SECONDS,
            debug: this.debugCode(issued),
          },
          [this.codeIssuedEvent(method, issued, 'login')],
        );
      },
      options,
    );
  }

  async completeLogin(
    input: CodeInput,
    context: RequestContext,
    options: FlowOptions = {},
  ): Promise<AuthenticatedResult> {
    return this.execute<AuthenticatedResult>(
      'completeLogin',
      async (uow) => {
        const method = await this.authMethods.findByProvider(uow, input.provider, input.externalId);
        if (!method) {
          throw invalidOrExpiredCode();
        }

        const account = await this.accounts.get(uow, method.accountId);
        if (account.status !== 'ACTIVE') {
          throw invalidAccountState();
        }
        if (!method.isVerified) {
          throw invalidOrExpiredCode();
        }

        const check = await this.codes.validate(uow, method.id, input.code);
        if (check.status === 'rejected') {
          return reject(this.codeRejection(check));
        }

        const session = await this.beginSession(uow, account, method, context);

        return accept({ account, tokens: session.tokens }, [
          this.sessionStartedEvent(session.started),
        ]);
      },
      options,
    );
  }

  async refreshSession(
    refreshToken: string,
    context: RequestContext,
    options: FlowOptions = {},
  ): Promise<AuthenticatedResult> {
    return this.execute<AuthenticatedResult>(
      'refreshSession',
      async (uow) => {
        const current = await this.sessions.validate(uow, refreshToken);
        const account = await this.accounts.get(uow, current.accountId);
        if (account.status !== 'ACTIVE') {
          throw invalidAccountState();
        }

        const started = await this.sessions.startSession(uow, account.id, context);
        const tokens = this.mintTokens(account, started);

        return accept({ account, tokens }, [
          identityEvent('identity.session.rotated', {
            accountId: account.id,
            sessionId: started.record.id,
            previousSessionId: current.tokenId,
          }),
        ]);
      },
      options,
    );
  }

  async logout(refreshToken: string, options: FlowOptions = {}): Promise<void> {
    return this.execute<void>(
      'logout',
      async (uow) => {
        const record = await this.sessions.find(uow, refreshToken);
        if (!record) {
          throw notFound('IDENTITY_SESSION_NOT_FOUND', 'Session not found.');
        }

        await this.sessions.revoke(uow, record.id);

        return accept(undefined, [
          identityEvent('identity.session.revoked', {
            accountId: record.accountId,
            sessionId: record.id,
          }),
        ]);
      },
      options,
    );
  }

  async logoutAll(accountId: string, options: FlowOptions = {}): Promise<LogoutAllResult> {
    return this.execute<LogoutAllResult>(
      'logoutAll',
      async (uow) => {
        await this.accounts.get(uow, accountId);
        const revokedCount = await this.sessions.revokeAll(uow, accountId);

        return accept({ revokedCount }, [
          identityEvent('identity.sessions.revoked', { accountId, revokedCount }),
        ]);
      },
      options,
    );
  }

  async getAccount(accountId: string, options: FlowOptions = {}): Promise<Account> {
    return this.execute<Account>(
      'getAccount',
      async (uow) => accept(await this.accounts.get(uow, accountId)),
      options,
    );
  }

  private async execute<T>(
    operation: string,
    work: (uow: UnitOfWork) => Promise<Outcome<T>>,
    options: FlowOptions,
  ): Promise<T> {
    const deadline = createDeadline(this.env.UNIT_OF_WORK_TIMEOUT_MS, options.signal);

    let outcome: Outcome<T>;
    try {
      outcome = await this.coordinator.runAtomic(work, { signal: deadline.signal });
    } catch (error) {
      throw this.translate(operation, error);
    } finally {
      deadline.dispose();
    }

    if (!outcome.ok) {
      throw outcome.error;
    }

    await this.dispatch(outcome.events);
    return outcome.value;
  }

  private translate(operation: string, error: unknown): ServiceError {
    if (error instanceof ServiceError) {
      return error;
    }

    if (isAbortError(error)) {
      this.logger.warn({ operation }, 'identity unit of work aborted');
      return requestAborted();
    }

    if (error instanceof UniqueConstraintError) {
      this.logger.warn({ operation, constraint: error.constraint }, 'identity write conflicted');
      return error.constraint.startsWith('auth_methods')
        ? conflict('IDENTITY_ACCOUNT_EXISTS', 'An account already exists for this identity.')
        : conflict('IDENTITY_CONCURRENT_UPDATE', 'The request conflicted with another request.');
    }

    this.logger.error({ err: error, operation }, 'identity unit of work failed');
    return internal();
  }

  private async dispatch(events: IdentityEvent[]) {
    for (const event of events) {
      try {
        await this.events.publish(event.name, event.payload);
      } catch (error) {
        this.logger.warn({ err: error, event: event.name }, 'failed to publish identity event');
      }
    }
  }

  private codeRejection(check: Extract<CodeCheck, { status: 'rejected' }>) {
    if (check.reason === 'locked') {
      return attemptsExceeded();
    }
    // the failed attempt that reaches the limit locks the code
    if (check.reason === 'mismatch' && check.attempts >= this.codes.maxAttempts) {
      return attemptsExceeded();
    }

    return invalidOrExpiredCode();
  }

  private async beginSession(
    uow: UnitOfWork,
    account: Account,
    method: AuthMethod,
    context: RequestContext,
  ) {
    const started = await this.sessions.startSession(uow, account.id, context);
    await this.authMethods.recordLogin(uow, method.id, this.clock.now());

    return { started, tokens: this.mintTokens(account, started) };
  }

  private mintTokens(account: Account, started: StartedSession): AuthTokens {
    const access = this.tokenIssuer.signAccessToken({
      sub: account.id,
      role: account.role,
      status: account.status,
    });

    return {
      accessToken: access.token,
      accessTokenExpiresAt: access.expiresAt,
      refreshToken: started.refreshToken,
      refreshTokenExpiresAt: started.record.expiresAt,
    };
  }

  private codeIssuedEvent(method: AuthMethod, issued: IssuedCode, purpose: 'registration' | 'login') {
    return identityEvent('identity.verification_code.issued', {
      accountId: method.accountId,
      authMethodId: method.id,
      provider: method.provider,
      destination: method.providerId,
      code: issued.code,
      purpose,
      expiresAt: issued.expiresAt.toISOString(),
    });
  }

  private sessionStartedEvent(started: StartedSession) {
    return identityEvent('identity.session.started', {
      accountId: started.record.accountId,
      sessionId: started.record.id,
      ipAddress: started.record.ipAddress,
      userAgent: started.record.userAgent,
    });
  }

  private debugCode(issued: IssuedCode | null) {
    if (this.env.isProduction || !issued) {
      return undefined;
    }

    return { verificationCode: issued.code };
  }
}
