import type { Server } from 'http';
import { fileURLToPath } from 'url';
import { createApp } from './app.js';
import { loadConfig } from '../config/index.js';
import { closePool, getPool, initPool } from '../db/pool.js';
import { ensureTables } from '../db/migrate.js';
import { PgUserRepo } from '../db/userRepo.js';

/**
 * Stop accepting connections, wait for in-flight requests, then close the pool.
 */
export async function shutdown(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await closePool();
}

export async function start(): Promise<Server> {
  const config = loadConfig();

  await initPool(config);
  await ensureTables();

  const app = createApp({
    users: new PgUserRepo(),
    pingDatabase: async () => {
      await getPool().query('SELECT 1');
    },
    rateLimitPerMinute: config.rateLimitPerMinute,
  });

  const server = app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
  });

  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`${signal} received, shutting down`);
    shutdown(server)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return server;
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  start().catch((error: unknown) => {
    console.error('Startup failed:', error);
    closePool()
      .catch((closeError: unknown) => {
        console.error('Failed to close database pool:', closeError);
      })
      .finally(() => process.exit(1));
  });
}
