import type { FastifyBaseLogger } from 'fastify';

import { isAbortError } from '../../errors';
import { throwIfAborted, whenAborted } from '../../lib/abort';
import type {
  RunAtomicOptions,
  TransactionCoordinator,
  UnitOfWork,
} from '../identity-repository';
import { createPgUnitOfWork, type PgQueryClient } from './pg-identity-repository';

export interface PgPoolClient extends PgQueryClient {
  release(destroy?: boolean | Error): void;
}

/** Satisfied by `pg.Pool`. */
export interface PgPool {
  connect(): Promise<PgPoolClient>;
}

export class PgTransactionCoordinator implements TransactionCoordinator {
  constructor(
    private readonly pool: PgPool,
    private readonly logger: FastifyBaseLogger,
  ) {}

  async runAtomic<T>(
    work: (uow: UnitOfWork) => Promise<T>,
    options: RunAtomicOptions = {},
  ): Promise<T> {
    const signal = options.signal ?? new AbortController().signal;
    throwIfAborted(signal);

    const client = await this.pool.connect();
    const aborted = whenAborted(signal);
    let discardConnection: boolean | Error = false;

    try {
      await Promise.race([client.query('BEGIN'), aborted.promise]);
      const result = await Promise.race([work(createPgUnitOfWork(client, signal)), aborted.promise]);
      throwIfAborted(signal);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      if (isAbortError(error)) {
        // a ROLLBACK would queue behind the statement still in flight; closing
        // the connection ends the transaction on the server instead
        discardConnection = error;
        throw error;
      }

      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        discardConnection = true;
        this.logger.error({ err: rollbackError }, 'failed to roll back identity transaction');
      }

      throw error;
    } finally {
      aborted.dispose();
      client.release(discardConnection);
    }
  }
}
