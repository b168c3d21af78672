import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { Pool } from 'pg';

export interface PgPluginOptions {
  connectionString: string;
  max: number;
  pool?: Pool;
}

const pgPlugin: FastifyPluginAsync<PgPluginOptions> = async (fastify, opts) => {
  const pool =
    opts.pool ??
    new Pool({
      connectionString: opts.connectionString,
      max: opts.max,
    });

  pool.on('error', (error) => {
    fastify.log.error({ err: error }, 'idle PostgreSQL client failed');
  });

  fastify.decorate('pg', pool);

  fastify.addHook('onClose', async () => {
    await pool.end();
  });
};

export default fp(pgPlugin, {
  name: 'pg-plugin',
});
