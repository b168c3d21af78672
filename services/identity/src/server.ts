import { buildApp } from './app';
import { env } from './env';
import { applySchema } from './repositories/pg/schema';

async function start() {
  const app = await buildApp();

  try {
    if (env.DATABASE_APPLY_SCHEMA) {
      await applySchema(app.pg, app.log);
    }

    await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`identity service listening on port ${env.PORT}`);
  } catch (error) {
    app.log.error(error, 'failed to start identity service');
    process.exitCode = 1;
    await app.close();
  }
}

void start();
