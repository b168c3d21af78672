export const ROLES = ['ADMIN', 'USER'] as const;
export const ACCOUNT_STATUSES = ['PENDING', 'ACTIVE', 'BANNED', 'DELETED'] as const;
export const AUTH_PROVIDERS = ['EMAIL', 'GOOGLE'] as const;

export type Role = (typeof ROLES)[number];
export type AccountStatus = (typeof ACCOUNT_STATUSES)[number];
export type AuthProvider = (typeof AUTH_PROVIDERS)[number];

export interface Account {
  id: string;
  role: Role;
  status: AccountStatus;
  createdAt: Date;
}

export interface AuthMethod {
  id: string;
  accountId: string;
  provider: AuthProvider;
  providerId: string;
  isVerified: boolean;
  lastLoginAt: Date | null;
}

export interface VerificationCodeRecord {
  id: string;
  authMethodId: string;
  codeHash: string;
  attempts: number;
  expiresAt: Date;
  consumedAt: Date | null;
  createdAt: Date;
}

export interface RefreshTokenRecord {
  id: string;
  accountId: string;
  tokenHash: string;
  ipAddress: string | null;
  userAgent: string | null;
  revokedAt: Date | null;
  expiresAt: Date;
  createdAt: Date;
}

export interface RequestContext {
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AccessTokenClaims {
  sub: string;
  role: Role;
  status: AccountStatus;
}

export function isActiveCode(code: VerificationCodeRecord, now: Date) {
  return code.consumedAt === null && code.expiresAt.getTime() > now.getTime();
}

export function isActiveToken(token: RefreshTokenRecord, now: Date) {
  return token.revokedAt === null && token.expiresAt.getTime() > now.getTime();
}
