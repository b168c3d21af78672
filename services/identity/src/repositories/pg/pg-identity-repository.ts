import { z } from 'zod';

import {
  ACCOUNT_STATUSES,
  AUTH_PROVIDERS,
  ROLES,
  type Account,
  type AccountStatus,
  type AuthMethod,
  type AuthProvider,
  type RefreshTokenRecord,
  type VerificationCodeRecord,
} from '../../domain/models';
import { UniqueConstraintError } from '../../errors';
import { throwIfAborted } from '../../lib/abort';
import type {
  AccountRepository,
  AuthMethodRepository,
  CreateAccountInput,
  CreateAuthMethodInput,
  CreateRefreshTokenInput,
  CreateVerificationCodeInput,
  RefreshTokenRepository,
  UnitOfWork,
  VerificationCodeRepository,
} from '../identity-repository';

const UNIQUE_VIOLATION = '23505';

/** The slice of a `pg` client the repositories use. */
export interface PgQueryClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const AccountRow = z.object({
  id: z.string(),
  role_code: z.enum(ROLES),
  status_code: z.enum(ACCOUNT_STATUSES),
  created_at: z.date(),
});

const AuthMethodRow = z.object({
  id: z.string(),
  account_id: z.string(),
  provider_code: z.enum(AUTH_PROVIDERS),
  provider_id: z.string(),
  is_verified: z.boolean(),
  last_login_at: z.date().nullable(),
});

const VerificationCodeRow = z.object({
  id: z.string(),
  auth_method_id: z.string(),
  code_hash: z.string(),
  attempts: z.number().int(),
  expires_at: z.date(),
  consumed_at: z.date().nullable(),
  created_at: z.date(),
});

const RefreshTokenRow = z.object({
  id: z.string(),
  account_id: z.string(),
  token_hash: z.string(),
  ip_address: z.string().nullable(),
  user_agent: z.string().nullable(),
  revoked_at: z.date().nullable(),
  expires_at: z.date(),
  created_at: z.date(),
});

const ACCOUNT_COLUMNS = 'id, role_code, status_code, created_at';
const AUTH_METHOD_COLUMNS = 'id, account_id, provider_code, provider_id, is_verified, last_login_at';
const VERIFICATION_CODE_COLUMNS =
  'id, auth_method_id, code_hash, attempts, expires_at, consumed_at, created_at';
const REFRESH_TOKEN_COLUMNS =
  'id, account_id, token_hash, ip_address, user_agent, revoked_at, expires_at, created_at';

function mapAccount(row: unknown): Account {
  const parsed = AccountRow.parse(row);
  return {
    id: parsed.id,
    role: parsed.role_code,
    status: parsed.status_code,
    createdAt: parsed.created_at,
  };
}

function mapAuthMethod(row: unknown): AuthMethod {
  const parsed = AuthMethodRow.parse(row);
  return {
    id: parsed.id,
    accountId: parsed.account_id,
    provider: parsed.provider_code,
    providerId: parsed.provider_id,
    isVerified: parsed.is_verified,
    lastLoginAt: parsed.last_login_at,
  };
}

function mapVerificationCode(row: unknown): VerificationCodeRecord {
  const parsed = VerificationCodeRow.parse(row);
  return {
    id: parsed.id,
    authMethodId: parsed.auth_method_id,
    codeHash: parsed.code_hash,
    attempts: parsed.attempts,
    expiresAt: parsed.expires_at,
    consumedAt: parsed.consumed_at,
    createdAt: parsed.created_at,
  };
}

function mapRefreshToken(row: unknown): RefreshTokenRecord {
  const parsed = RefreshTokenRow.parse(row);
  return {
    id: parsed.id,
    accountId: parsed.account_id,
    tokenHash: parsed.token_hash,
    ipAddress: parsed.ip_address,
    userAgent: parsed.user_agent,
    revokedAt: parsed.revoked_at,
    expiresAt: parsed.expires_at,
    createdAt: parsed.created_at,
  };
}

function uniqueViolation(error: unknown): UniqueConstraintError | null {
  if (!(error instanceof Error) || !('code' in error) || error.code !== UNIQUE_VIOLATION) {
    return null;
  }

  const constraint =
    'constraint' in error && typeof error.constraint === 'string' ? error.constraint : 'unknown';
  return new UniqueConstraintError(constraint);
}

/**
 * Runs statements on the transaction's client. Refuses to run once the unit
 * of work is aborted, since the coordinator may already have rolled back.
 */
export class PgExecutor {
  constructor(
    private readonly client: PgQueryClient,
    private readonly signal: AbortSignal,
  ) {}

  async query(text: string, values: unknown[] = []) {
    throwIfAborted(this.signal);

    try {
      return await this.client.query(text, values);
    } catch (error) {
      throw uniqueViolation(error) ?? error;
    }
  }
}

export class PgAccountRepository implements AccountRepository {
  constructor(private readonly db: PgExecutor) {}

  async create(input: CreateAccountInput): Promise<Account> {
    const { rows } = await this.db.query(
      `INSERT INTO accounts (role_code, status_code) VALUES ($1, $2) RETURNING ${ACCOUNT_COLUMNS}`,
      [input.role, input.status],
    );
    return mapAccount(rows[0]);
  }

  async findById(id: string): Promise<Account | null> {
    const { rows } = await this.db.query(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`,
      [id],
    );
    return rows[0] ? mapAccount(rows[0]) : null;
  }

  async updateStatus(id: string, from: AccountStatus, to: AccountStatus): Promise<Account | null> {
    const { rows } = await this.db.query(
      `UPDATE accounts SET status_code = $3
       WHERE id = $1 AND status_code = $2
       RETURNING ${ACCOUNT_COLUMNS}`,
      [id, from, to],
    );
    return rows[0] ? mapAccount(rows[0]) : null;
  }
}

export class PgAuthMethodRepository implements AuthMethodRepository {
  constructor(private readonly db: PgExecutor) {}

  async create(input: CreateAuthMethodInput): Promise<AuthMethod> {
    const { rows } = await this.db.query(
      `INSERT INTO auth_methods (account_id, provider_code, provider_id, is_verified)
       VALUES ($1, $2, $3, $4)
       RETURNING ${AUTH_METHOD_COLUMNS}`,
      [input.accountId, input.provider, input.providerId, input.isVerified],
    );
    return mapAuthMethod(rows[0]);
  }

  async findById(id: string): Promise<AuthMethod | null> {
    const { rows } = await this.db.query(
      `SELECT ${AUTH_METHOD_COLUMNS} FROM auth_methods WHERE id = $1`,
      [id],
    );
    return rows[0] ? mapAuthMethod(rows[0]) : null;
  }

  async findByProvider(provider: AuthProvider, providerId: string): Promise<AuthMethod | null> {
    const { rows } = await this.db.query(
      `SELECT ${AUTH_METHOD_COLUMNS} FROM auth_methods
       WHERE provider_code = $1 AND provider_id = $2`,
      [provider, providerId],
    );
    return rows[0] ? mapAuthMethod(rows[0]) : null;
  }

  async findByAccountId(accountId: string): Promise<AuthMethod | null> {
    const { rows } = await this.db.query(
      `SELECT ${AUTH_METHOD_COLUMNS} FROM auth_methods WHERE account_id = $1`,
      [accountId],
    );
    return rows[0] ? mapAuthMethod(rows[0]) : null;
  }

  async markVerified(id: string): Promise<void> {
    await this.db.query('UPDATE auth_methods SET is_verified = true WHERE id = $1', [id]);
  }

  async updateLastLogin(id: string, when: Date): Promise<void> {
    await this.db.query('UPDATE auth_methods SET last_login_at = $2 WHERE id = $1', [id, when]);
  }
}

export class PgVerificationCodeRepository implements VerificationCodeRepository {
  constructor(private readonly db: PgExecutor) {}

  async create(input: CreateVerificationCodeInput): Promise<VerificationCodeRecord> {
    const { rows } = await this.db.query(
      `INSERT INTO verification_codes (auth_method_id, code_hash, expires_at, created_at)
       VALUES ($1, $2, $3, $4)
       RETURNING ${VERIFICATION_CODE_COLUMNS}`,
      [input.authMethodId, input.codeHash, input.expiresAt, input.createdAt],
    );
    return mapVerificationCode(rows[0]);
  }

  async findUnconsumed(authMethodId: string): Promise<VerificationCodeRecord | null> {
    // row lock serialises concurrent validations of the same code
    const { rows } = await this.db.query(
      `SELECT ${VERIFICATION_CODE_COLUMNS} FROM verification_codes
       WHERE auth_method_id = $1 AND consumed_at IS NULL
       ORDER BY created_at DESC
       LIMIT 1
       FOR UPDATE`,
      [authMethodId],
    );
    return rows[0] ? mapVerificationCode(rows[0]) : null;
  }

  async deleteUnconsumed(authMethodId: string): Promise<number> {
    const result = await this.db.query(
      'DELETE FROM verification_codes WHERE auth_method_id = $1 AND consumed_at IS NULL',
      [authMethodId],
    );
    return result.rowCount ?? 0;
  }

  async incrementAttempts(id: string): Promise<number> {
    const { rows } = await this.db.query(
      `UPDATE verification_codes SET attempts = attempts + 1 WHERE id = $1
       RETURNING ${VERIFICATION_CODE_COLUMNS}`,
      [id],
    );
    return rows[0] ? mapVerificationCode(rows[0]).attempts : 0;
  }

  async markConsumed(id: string, when: Date): Promise<boolean> {
    const result = await this.db.query(
      'UPDATE verification_codes SET consumed_at = $2 WHERE id = $1 AND consumed_at IS NULL',
      [id, when],
    );
    return (result.rowCount ?? 0) > 0;
  }
}

export class PgRefreshTokenRepository implements RefreshTokenRepository {
  constructor(private readonly db: PgExecutor) {}

  async create(input: CreateRefreshTokenInput): Promise<RefreshTokenRecord> {
    const { rows } = await this.db.query(
      `INSERT INTO refresh_tokens
         (account_id, token_hash, ip_address, user_agent, expires_at, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${REFRESH_TOKEN_COLUMNS}`,
      [
        input.accountId,
        input.tokenHash,
        input.ipAddress,
        input.userAgent,
        input.expiresAt,
        input.createdAt,
      ],
    );
    return mapRefreshToken(rows[0]);
  }

  async findById(id: string): Promise<RefreshTokenRecord | null> {
    const { rows } = await this.db.query(
      `SELECT ${REFRESH_TOKEN_COLUMNS} FROM refresh_tokens WHERE id = $1`,
      [id],
    );
    return rows[0] ? mapRefreshToken(rows[0]) : null;
  }

  async findByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
    const { rows } = await this.db.query(
      `SELECT ${REFRESH_TOKEN_COLUMNS} FROM refresh_tokens WHERE token_hash = $1`,
      [tokenHash],
    );
    return rows[0] ? mapRefreshToken(rows[0]) : null;
  }

  async revoke(id: string, when: Date): Promise<boolean> {
    const result = await this.db.query(
      'UPDATE refresh_tokens SET revoked_at = $2 WHERE id = $1 AND revoked_at IS NULL',
      [id, when],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async revokeAllForAccount(accountId: string, when: Date): Promise<number> {
    const result = await this.db.query(
      'UPDATE refresh_tokens SET revoked_at = $2 WHERE account_id = $1 AND revoked_at IS NULL',
      [accountId, when],
    );
    return result.rowCount ?? 0;
  }
}

export function createPgUnitOfWork(client: PgQueryClient, signal: AbortSignal): UnitOfWork {
  const db = new PgExecutor(client, signal);

  return {
    accounts: new PgAccountRepository(db),
    authMethods: new PgAuthMethodRepository(db),
    verificationCodes: new PgVerificationCodeRepository(db),
    refreshTokens: new PgRefreshTokenRepository(db),
    signal,
  };
}
