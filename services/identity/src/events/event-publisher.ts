import type { FastifyBaseLogger } from 'fastify';

import type { AccountStatus, AuthProvider } from '../domain/models';

export interface IdentityEventMap {
  'identity.account.registered': {
    accountId: string;
    authMethodId: string;
    provider: AuthProvider;
    status: AccountStatus;
  };
  'identity.verification_code.issued': {
    accountId: string;
    authMethodId: string;
    provider: AuthProvider;
    destination: string;
    code: string;
    purpose: 'registration' | 'login';
    expiresAt: string;
  };
  'identity.account.verified': {
    accountId: string;
    authMethodId: string;
  };
  'identity.session.started': {
    accountId: string;
    sessionId: string;
    ipAddress: string | null;
    userAgent: string | null;
  };
  'identity.session.rotated': {
    accountId: string;
    sessionId: string;
    previousSessionId: string;
  };
  'identity.session.revoked': {
    accountId: string;
    sessionId: string;
  };
  'identity.sessions.revoked': {
    accountId: string;
    revokedCount: number;
  };
}

export type IdentityEventName = keyof IdentityEventMap;

export interface IdentityEvent<K extends IdentityEventName = IdentityEventName> {
  name: K;
  payload: IdentityEventMap[K];
}

export function identityEvent<K extends IdentityEventName>(
  name: K,
  payload: IdentityEventMap[K],
): IdentityEvent<K> {
  return { name, payload };
}

/**
 * Best-effort delivery. Called only after the unit of work that produced the
 * event has committed.
 */
export interface EventPublisher {
  publish<K extends IdentityEventName>(name: K, payload: IdentityEventMap[K]): Promise<void>;
}

const REDACTED_FIELDS = new Set(['code']);

/**
 * Writes events to the service log. Stands in for a message-bus transport in
 * environments without one; one-time codes are redacted.
 */
export class LogEventPublisher implements EventPublisher {
  constructor(private readonly logger: FastifyBaseLogger) {}

  async publish<K extends IdentityEventName>(name: K, payload: IdentityEventMap[K]) {
    const redacted = Object.fromEntries(
      Object.entries(payload).map(([key, value]) => [
        key,
        REDACTED_FIELDS.has(key) ? '[redacted]' : value,
      ]),
    );

    this.logger.info({ event: name, payload: redacted }, 'identity event published');
  }
}
