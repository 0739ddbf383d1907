import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import request from 'supertest';
import type express from 'express';
import { createApp } from '../app.js';
import { loadConfig } from '../../config/index.js';
import { closePool, getPool, initPool } from '../../db/pool.js';
import { PgUserRepo } from '../../db/userRepo.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('GET /health', () => {
  let app: express.Express;

  beforeAll(async () => {
    await initPool(loadConfig());
    app = createApp({
      users: new PgUserRepo(),
      pingDatabase: async () => {
        await getPool().query('SELECT 1');
      },
      rateLimitPerMinute: 1000,
    });
  });

  afterAll(async () => {
    await closePool();
  });

  it('returns 200 when DB is reachable', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });
});
