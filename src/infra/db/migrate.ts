import { withClient } from './pool.js';

export const USERS_TABLE_DDL = `
CREATE TABLE IF NOT EXISTS users (
  id SERIAL PRIMARY KEY,
  name VARCHAR(100) NOT NULL,
  email VARCHAR(100) UNIQUE NOT NULL,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
)`;

/**
 * Create the tables the service needs. Safe to run on every startup.
 */
export async function ensureTables(): Promise<void> {
  await withClient(async (client) => {
    await client.query(USERS_TABLE_DDL);
  });
  console.log('✓ Tables ensured: users');
}
