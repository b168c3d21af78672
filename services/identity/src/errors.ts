export type ErrorKind =
  | 'bad_request'
  | 'not_found'
  | 'conflict'
  | 'invalid_credentials'
  | 'invalid_code'
  | 'invalid_token'
  | 'invalid_account_state'
  | 'too_many_attempts'
  | 'unavailable'
  | 'internal';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  bad_request: 400,
  not_found: 404,
  conflict: 409,
  invalid_credentials: 401,
  invalid_code: 401,
  invalid_token: 401,
  invalid_account_state: 403,
  too_many_attempts: 429,
  unavailable: 503,
  internal: 500,
};

export class ServiceError extends Error {
  readonly status: number;

  constructor(
    readonly kind: ErrorKind,
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown> | null,
  ) {
    super(message);
    this.name = 'ServiceError';
    this.status = STATUS_BY_KIND[kind];
  }
}

export function badRequest(code: string, message: string, details?: Record<string, unknown>) {
  return new ServiceError('bad_request', code, message, details);
}

export function notFound(code: string, message: string) {
  return new ServiceError('not_found', code, message);
}

export function conflict(code: string, message: string) {
  return new ServiceError('conflict', code, message);
}

export function invalidCredentials() {
  return new ServiceError(
    'invalid_credentials',
    'IDENTITY_INVALID_CREDENTIALS',
    'The supplied credentials are invalid.',
  );
}

export function invalidOrExpiredCode() {
  return new ServiceError(
    'invalid_code',
    'IDENTITY_INVALID_OR_EXPIRED_CODE',
    'The verification code is invalid or has expired.',
  );
}

export function invalidToken(code = 'IDENTITY_INVALID_TOKEN', message = 'Token is invalid or expired.') {
  return new ServiceError('invalid_token', code, message);
}

export function invalidAccountState() {
  return new ServiceError(
    'invalid_account_state',
    'IDENTITY_INVALID_ACCOUNT_STATE',
    'The account cannot perform this action in its current state.',
  );
}

export function attemptsExceeded() {
  return new ServiceError(
    'too_many_attempts',
    'IDENTITY_VERIFICATION_ATTEMPTS_EXCEEDED',
    'Too many incorrect verification attempts. Request a new code.',
  );
}

export function requestAborted() {
  return new ServiceError(
    'unavailable',
    'IDENTITY_REQUEST_ABORTED',
    'The request was cancelled before it completed.',
  );
}

export function internal() {
  return new ServiceError('internal', 'IDENTITY_INTERNAL_ERROR', 'An unexpected error occurred.');
}

/**
 * Raised by repositories when the store rejects a write on a uniqueness
 * constraint. Never crosses the engine boundary; binding and coordinator
 * callers turn it into a `conflict`.
 */
export class UniqueConstraintError extends Error {
  constructor(readonly constraint: string) {
    super(`Unique constraint violated: ${constraint}`);
    this.name = 'UniqueConstraintError';
  }
}

export function isAbortError(error: unknown): error is Error {
  return error instanceof Error && error.name === 'AbortError';
}
