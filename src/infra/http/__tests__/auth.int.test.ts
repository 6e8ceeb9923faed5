import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import request from 'supertest';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { createApp } from '../app.js';
import { createPool } from '../../db/pool.js';
import { PgUserSessions } from '../../db/userRepo.js';
import { Password } from '../../../domain/auth/password.js';
import { TokenCodec } from '../../../domain/auth/token.js';
import { createLogger } from '../../logger.js';
import { TOKEN_CONFIG } from './testApp.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('Auth API (PostgreSQL)', () => {
  const pool = createPool(process.env.DATABASE_URL, createLogger({ level: 'silent' }));
  const app = createApp({
    sessions: new PgUserSessions(pool),
    hasher: new Password(),
    tokens: new TokenCodec(TOKEN_CONFIG),
    summarizer: { summarize: async (text: string) => text },
    logger: createLogger({ level: 'silent' }),
    healthCheck: () => pool.query('SELECT 1'),
  });
  const uniqueEmail = (label: string) =>
    `vitest-${label}-${Date.now()}-${Math.random().toString(16).slice(2)}@example.com`;

  beforeAll(async () => {
    const sql = await readFile(
      join(process.cwd(), 'src/infra/db/migrations/001_create_users.sql'),
      'utf-8'
    );
    await pool.query(sql);
  });

  afterEach(async () => {
    await pool.query("DELETE FROM users WHERE email LIKE 'vitest-%@example.com'");
  });

  afterAll(async () => {
    await pool.end();
  });

  it('returns 200 from /healthz when DB is reachable', async () => {
    const res = await request(app).get('/healthz');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  it('should register, log in and read the profile', async () => {
    const email = uniqueEmail('flow');

    const registered = await request(app)
      .post('/auth/register')
      .send({ name: 'Ann', email, password: 'secret123' });
    expect(registered.status).toBe(200);

    const login = await request(app).post('/auth/login').send({ email, password: 'secret123' });
    expect(login.status).toBe(200);

    const me = await request(app)
      .get('/auth/me')
      .set('Authorization', `Bearer ${login.body.access_token}`);
    expect(me.status).toBe(200);
    expect(me.body).toEqual({ id: registered.body.id, name: 'Ann', email });
  });

  it('should let only one of two concurrent registrations succeed', async () => {
    const email = uniqueEmail('race');

    const responses = await Promise.all([
      request(app).post('/auth/register').send({ name: 'One', email, password: 'secret123' }),
      request(app).post('/auth/register').send({ name: 'Two', email, password: 'secret456' }),
    ]);

    expect(responses.map((r) => r.status).sort()).toEqual([200, 400]);
    const rejected = responses.find((r) => r.status === 400);
    expect(rejected?.body.code).toBe('DUPLICATE_EMAIL');
  });
});
