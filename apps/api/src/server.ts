import 'dotenv/config';
import { mkdir } from 'fs/promises';
import * as path from 'path';
import { buildApp } from './app';
import { loadConfig } from './config';
import { createExerciseRepository } from './db/repositories';
import { IN_MEMORY } from './db/connection';
import { initializeLogging } from './utils/logger';

async function start() {
  const config = loadConfig();
  const logger = initializeLogging({ level: config.logLevel });

  if (config.dbPath !== IN_MEMORY) {
    await mkdir(path.dirname(config.dbPath), { recursive: true });
  }

  const repository = await createExerciseRepository(config.dbPath, {
    maxConnections: config.poolMax,
    acquireTimeoutMillis: config.acquireTimeoutMillis,
  });

  const app = await buildApp({ repository, logger, corsOrigin: config.corsOrigin });
  app.addHook('onClose', async () => {
    await repository.close();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error(error, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`🚀 API Server running at http://${config.host}:${config.port}`);
}

start().catch((err: unknown) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
