import type { Account, AccountStatus, Role } from '../domain/models';
import { invalidAccountState, notFound } from '../errors';
import type { UnitOfWork } from '../repositories/identity-repository';

const ALLOWED_TRANSITIONS: Record<AccountStatus, readonly AccountStatus[]> = {
  PENDING: ['ACTIVE', 'DELETED'],
  ACTIVE: ['BANNED', 'DELETED'],
  BANNED: [],
  DELETED: [],
};

export function canTransition(from: AccountStatus, to: AccountStatus) {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export class AccountLifecycle {
  async create(uow: UnitOfWork, role: Role, initialStatus: AccountStatus): Promise<Account> {
    return uow.accounts.create({ role, status: initialStatus });
  }

  async get(uow: UnitOfWork, accountId: string): Promise<Account> {
    const account = await uow.accounts.findById(accountId);
    if (!account) {
      throw notFound('IDENTITY_ACCOUNT_NOT_FOUND', 'Account not found.');
    }

    return account;
  }

  /**
   * Moves the account along an allowed edge. Re-applying the current status
   * is not an edge and fails like any other disallowed move.
   */
  async setStatus(uow: UnitOfWork, accountId: string, status: AccountStatus): Promise<Account> {
    const current = await this.get(uow, accountId);

    if (!canTransition(current.status, status)) {
      throw invalidAccountState();
    }

    // a concurrent unit may have moved the account since it was read
    const updated = await uow.accounts.updateStatus(accountId, current.status, status);
    if (!updated) {
      throw invalidAccountState();
    }

    return updated;
  }
}
