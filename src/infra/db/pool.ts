import pg from 'pg';
import type { AppConfig } from '../config/index.js';
import { PoolNotInitializedError } from '../../application/errors.js';

const { Pool } = pg;

let pool: pg.Pool | null = null;
let initializing: Promise<pg.Pool> | null = null;

export function buildPoolConfig(config: AppConfig): pg.PoolConfig {
  const { database, pool: sizing } = config;
  const commandTimeoutMs = Math.round(sizing.commandTimeoutSeconds * 1000);

  const connection: pg.PoolConfig = database.connectionString
    ? { connectionString: database.connectionString }
    : {
        host: database.host,
        port: database.port,
        user: database.user,
        password: database.password,
        database: database.database,
      };

  return {
    ...connection,
    min: sizing.minSize,
    max: sizing.maxSize,
    idleTimeoutMillis: Math.round(sizing.idleTimeoutSeconds * 1000),
    connectionTimeoutMillis: commandTimeoutMs,
    query_timeout: commandTimeoutMs,
    statement_timeout: commandTimeoutMs,
  };
}

async function openPool(config: AppConfig): Promise<pg.Pool> {
  const created = new Pool(buildPoolConfig(config));

  // Idle clients can error (e.g. server restart); without a listener pg crashes the process
  created.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  try {
    const client = await created.connect();
    client.release();
  } catch (error) {
    await created.end();
    throw error;
  }

  console.log(
    `Database pool ready (min=${config.pool.minSize}, max=${config.pool.maxSize})`
  );
  return created;
}

/**
 * Open the shared pool and check that one connection can be acquired.
 * Returns the already-open pool when called twice; concurrent callers share
 * one initialization.
 */
export async function initPool(config: AppConfig): Promise<pg.Pool> {
  if (pool) {
    return pool;
  }
  if (!initializing) {
    initializing = openPool(config)
      .then((created) => {
        pool = created;
        return created;
      })
      .finally(() => {
        initializing = null;
      });
  }
  return initializing;
}

export function getPool(): pg.Pool {
  if (!pool) {
    throw new PoolNotInitializedError();
  }
  return pool;
}

/**
 * Run fn with a client checked out of the shared pool.
 * A client whose work failed is released with the error so pg discards it.
 */
export async function withClient<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    const result = await fn(client);
    client.release();
    return result;
  } catch (error) {
    client.release(error instanceof Error ? error : true);
    throw error;
  }
}

export async function closePool(): Promise<void> {
  if (initializing) {
    // A failed init already ended its pool and rejected to its own caller
    await initializing.catch(() => undefined);
  }
  if (!pool) {
    return;
  }
  const closing = pool;
  pool = null;
  await closing.end();
  console.log('Database pool closed');
}
