import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { poolMocks, resetPoolMocks, testConfig } from './poolMocks.js';
import { buildPoolConfig, closePool, getPool, initPool, withClient } from '../pool.js';
import { PoolNotInitializedError } from '../../../application/errors.js';

vi.mock('pg', async () => {
  const { poolMocks: mocks } = await import('./poolMocks.js');
  class Pool {
    on = mocks.on;
    end = mocks.end;
    connect = mocks.connect;
    query = mocks.query;

    constructor(config: unknown) {
      mocks.ctor(config);
    }
  }
  return { default: { Pool } };
});

describe('buildPoolConfig', () => {
  it('should map sizing and timeouts to pg options', () => {
    expect(buildPoolConfig(testConfig)).toEqual({
      host: 'localhost',
      port: 5432,
      user: 'postgres',
      password: 'test-secret',
      database: 'users_test',
      min: 2,
      max: 8,
      idleTimeoutMillis: 300000,
      connectionTimeoutMillis: 15000,
      query_timeout: 15000,
      statement_timeout: 15000,
    });
  });

  it('should prefer a connection string over discrete settings', () => {
    const config = buildPoolConfig({
      ...testConfig,
      database: {
        ...testConfig.database,
        connectionString: 'postgres://postgres:test-secret@db:5432/users_test',
      },
    });

    expect(config.connectionString).toBe('postgres://postgres:test-secret@db:5432/users_test');
    expect(config).not.toHaveProperty('host');
    expect(config.min).toBe(2);
  });
});

describe('pool lifecycle', () => {
  beforeEach(() => {
    resetPoolMocks();
  });

  afterEach(async () => {
    await closePool();
  });

  it('should throw before the pool is initialized', () => {
    expect(() => getPool()).toThrow(PoolNotInitializedError);
  });

  it('should create the pool and verify one connection', async () => {
    const pool = await initPool(testConfig);

    expect(poolMocks.ctor).toHaveBeenCalledWith(buildPoolConfig(testConfig));
    expect(poolMocks.on).toHaveBeenCalledWith('error', expect.any(Function));
    expect(poolMocks.connect).toHaveBeenCalledTimes(1);
    expect(poolMocks.release).toHaveBeenCalledTimes(1);
    expect(getPool()).toBe(pool);
  });

  it('should return the open pool when initialized twice', async () => {
    const first = await initPool(testConfig);
    const second = await initPool(testConfig);

    expect(second).toBe(first);
    expect(poolMocks.ctor).toHaveBeenCalledTimes(1);
  });

  it('should share one pool between concurrent initializations', async () => {
    const [first, second] = await Promise.all([initPool(testConfig), initPool(testConfig)]);

    expect(second).toBe(first);
    expect(poolMocks.ctor).toHaveBeenCalledTimes(1);
    expect(poolMocks.connect).toHaveBeenCalledTimes(1);

    await closePool();

    expect(poolMocks.end).toHaveBeenCalledTimes(1);
  });

  it('should close a pool whose initialization is still in flight', async () => {
    const opening = initPool(testConfig);

    await closePool();

    await expect(opening).resolves.toBeDefined();
    expect(poolMocks.end).toHaveBeenCalledTimes(1);
    expect(() => getPool()).toThrow(PoolNotInitializedError);
  });

  it('should allow a retry after a failed initialization', async () => {
    poolMocks.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    await expect(initPool(testConfig)).rejects.toThrow('connect ECONNREFUSED');

    const pool = await initPool(testConfig);

    expect(getPool()).toBe(pool);
    expect(poolMocks.ctor).toHaveBeenCalledTimes(2);
  });

  it('should end the pool when the first connection fails', async () => {
    poolMocks.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    await expect(initPool(testConfig)).rejects.toThrow('connect ECONNREFUSED');
    expect(poolMocks.end).toHaveBeenCalledTimes(1);
    expect(() => getPool()).toThrow(PoolNotInitializedError);
  });

  it('should end the pool once on close', async () => {
    await initPool(testConfig);

    await closePool();
    await closePool();

    expect(poolMocks.end).toHaveBeenCalledTimes(1);
    expect(() => getPool()).toThrow(PoolNotInitializedError);
  });

  it('should do nothing when closing a pool that was never opened', async () => {
    await closePool();

    expect(poolMocks.end).not.toHaveBeenCalled();
  });

  describe('withClient', () => {
    beforeEach(async () => {
      await initPool(testConfig);
      poolMocks.release.mockClear();
    });

    it('should release the client after success', async () => {
      const result = await withClient(async () => 'done');

      expect(result).toBe('done');
      expect(poolMocks.release).toHaveBeenCalledTimes(1);
      expect(poolMocks.release).toHaveBeenCalledWith();
    });

    it('should release the client with the error after failure', async () => {
      const failure = new Error('query failed');

      await expect(
        withClient(async () => {
          throw failure;
        })
      ).rejects.toBe(failure);
      expect(poolMocks.release).toHaveBeenCalledWith(failure);
    });
  });
});
