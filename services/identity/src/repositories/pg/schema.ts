import type { FastifyBaseLogger } from 'fastify';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { PgQueryClient } from './pg-identity-repository';

export const SCHEMA_PATH = path.resolve(__dirname, '../../../db/schema.sql');

/** Applies `db/schema.sql`. Every statement in it is idempotent. */
export async function applySchema(client: PgQueryClient, logger: FastifyBaseLogger) {
  const sql = await readFile(SCHEMA_PATH, 'utf8');
  await client.query(sql);
  logger.info({ schema: SCHEMA_PATH }, 'identity schema applied');
}
