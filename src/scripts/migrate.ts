import { loadConfig } from '../infra/config/index.js';
import { closePool, initPool } from '../infra/db/pool.js';
import { ensureTables } from '../infra/db/migrate.js';

async function migrate(): Promise<void> {
  console.log('Starting migrations...');
  const config = loadConfig();
  await initPool(config);
  try {
    await ensureTables();
  } finally {
    await closePool();
  }
}

migrate()
  .then(() => {
    console.log('Done.');
    process.exit(0);
  })
  .catch((error) => {
    console.error('Migration failed:', error);
    process.exit(1);
  });
