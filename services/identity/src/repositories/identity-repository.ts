import type {
  Account,
  AccountStatus,
  AuthMethod,
  AuthProvider,
  RefreshTokenRecord,
  Role,
  VerificationCodeRecord,
} from '../domain/models';

export interface CreateAccountInput {
  role: Role;
  status: AccountStatus;
}

export interface CreateAuthMethodInput {
  accountId: string;
  provider: AuthProvider;
  providerId: string;
  isVerified: boolean;
}

export interface CreateVerificationCodeInput {
  authMethodId: string;
  codeHash: string;
  expiresAt: Date;
  createdAt: Date;
}

export interface CreateRefreshTokenInput {
  accountId: string;
  tokenHash: string;
  ipAddress: string | null;
  userAgent: string | null;
  expiresAt: Date;
  createdAt: Date;
}

export interface AccountRepository {
  create(input: CreateAccountInput): Promise<Account>;
  findById(id: string): Promise<Account | null>;
  /**
   * Moves the account from `from` to `to`. Returns null when no account has
   * the given id or its committed status is no longer `from`.
   */
  updateStatus(id: string, from: AccountStatus, to: AccountStatus): Promise<Account | null>;
}

/** `create` rejects with `UniqueConstraintError` on a duplicate binding. */
export interface AuthMethodRepository {
  create(input: CreateAuthMethodInput): Promise<AuthMethod>;
  findById(id: string): Promise<AuthMethod | null>;
  findByProvider(provider: AuthProvider, providerId: string): Promise<AuthMethod | null>;
  findByAccountId(accountId: string): Promise<AuthMethod | null>;
  markVerified(id: string): Promise<void>;
  updateLastLogin(id: string, when: Date): Promise<void>;
}

export interface VerificationCodeRepository {
  create(input: CreateVerificationCodeInput): Promise<VerificationCodeRecord>;
  /** The single unconsumed code for the method, expired or not. */
  findUnconsumed(authMethodId: string): Promise<VerificationCodeRecord | null>;
  /** Deletes every unconsumed code for the method and returns how many went. */
  deleteUnconsumed(authMethodId: string): Promise<number>;
  incrementAttempts(id: string): Promise<number>;
  /** Sets consumed_at only if it is still null. */
  markConsumed(id: string, when: Date): Promise<boolean>;
}

export interface RefreshTokenRepository {
  create(input: CreateRefreshTokenInput): Promise<RefreshTokenRecord>;
  findById(id: string): Promise<RefreshTokenRecord | null>;
  findByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
  /** Sets revoked_at only if it is still null. */
  revoke(id: string, when: Date): Promise<boolean>;
  /** Revokes every unrevoked token of the account. */
  revokeAllForAccount(accountId: string, when: Date): Promise<number>;
}

export interface UnitOfWork {
  readonly accounts: AccountRepository;
  readonly authMethods: AuthMethodRepository;
  readonly verificationCodes: VerificationCodeRepository;
  readonly refreshTokens: RefreshTokenRepository;
  readonly signal: AbortSignal;
}

export interface RunAtomicOptions {
  signal?: AbortSignal;
}

/**
 * Runs `work` in one transaction. The repositories on the `UnitOfWork` handed
 * to `work` are bound to that transaction and must be the only ones used
 * inside it. Rejection or abort of `options.signal` rolls everything back;
 * resolution commits before `runAtomic` resolves.
 */
export interface TransactionCoordinator {
  runAtomic<T>(work: (uow: UnitOfWork) => Promise<T>, options?: RunAtomicOptions): Promise<T>;
}
