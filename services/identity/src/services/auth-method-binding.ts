import type { AuthMethod, AuthProvider } from '../domain/models';
import { UniqueConstraintError, conflict, notFound } from '../errors';
import type { UnitOfWork } from '../repositories/identity-repository';

export function normalizeProviderId(provider: AuthProvider, externalId: string) {
  const trimmed = externalId.trim();
  return provider === 'EMAIL' ? trimmed.toLowerCase() : trimmed;
}

export class AuthMethodBinding {
  async create(
    uow: UnitOfWork,
    accountId: string,
    provider: AuthProvider,
    externalId: string,
    initiallyVerified: boolean,
  ): Promise<AuthMethod> {
    const providerId = normalizeProviderId(provider, externalId);

    const existing = await uow.authMethods.findByAccountId(accountId);
    if (existing) {
      throw conflict('IDENTITY_ACCOUNT_EXISTS', 'An account already exists for this identity.');
    }

    try {
      return await uow.authMethods.create({
        accountId,
        provider,
        providerId,
        isVerified: initiallyVerified,
      });
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw conflict('IDENTITY_ACCOUNT_EXISTS', 'An account already exists for this identity.');
      }

      throw error;
    }
  }

  async findByProvider(
    uow: UnitOfWork,
    provider: AuthProvider,
    externalId: string,
  ): Promise<AuthMethod | null> {
    return uow.authMethods.findByProvider(provider, normalizeProviderId(provider, externalId));
  }

  async markVerified(uow: UnitOfWork, authMethodId: string) {
    await this.require(uow, authMethodId);
    await uow.authMethods.markVerified(authMethodId);
  }

  async recordLogin(uow: UnitOfWork, authMethodId: string, when: Date) {
    await this.require(uow, authMethodId);
    await uow.authMethods.updateLastLogin(authMethodId, when);
  }

  private async require(uow: UnitOfWork, authMethodId: string) {
    const method = await uow.authMethods.findById(authMethodId);
    if (!method) {
      throw notFound('IDENTITY_AUTH_METHOD_NOT_FOUND', 'Authentication method not found.');
    }

    return method;
  }
}
