import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { buildTestApp } from './testApp.js';
import { HashingError } from '../../../domain/auth/errors.js';

describe('app', () => {
  describe('GET /healthz', () => {
    it('should report ok when the store answers', async () => {
      const { app } = buildTestApp();

      const response = await request(app).get('/healthz');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok' });
    });

    it('should report the database as unavailable when the check fails', async () => {
      const { app } = buildTestApp({
        healthCheck: vi.fn(async () => Promise.reject(new Error('connection refused'))),
      });

      const response = await request(app).get('/healthz');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        code: 'DB_UNAVAILABLE',
        message: 'Database unavailable',
      });
    });
  });

  describe('error mapping', () => {
    it('should answer 404 for unknown routes', async () => {
      const { app } = buildTestApp();

      const response = await request(app).get('/nope');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        code: 'NOT_FOUND',
        message: 'Route GET /nope not found',
      });
    });

    it('should answer 400 for a body that is not JSON', async () => {
      const { app } = buildTestApp();

      const response = await request(app)
        .post('/auth/login')
        .set('Content-Type', 'application/json')
        .send('{"email":');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('INVALID_JSON');
    });

    it('should answer 413 for a body over the configured limit', async () => {
      const { app } = buildTestApp({ bodyLimit: '1kb' });

      const response = await request(app)
        .post('/summaries/')
        .send({ text: 'Cats sleep most of the day. '.repeat(100) });

      expect(response.status).toBe(413);
      expect(response.body).toEqual({
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Request body too large',
      });
    });

    it('should answer 415 for a body in an unsupported charset', async () => {
      const { app } = buildTestApp();

      const response = await request(app)
        .post('/auth/login')
        .set('Content-Type', 'application/json; charset=iso-8859-1')
        .send('{"email":"ann@example.com","password":"pw"}');

      expect(response.status).toBe(415);
      expect(response.body).toEqual({
        code: 'UNSUPPORTED_CHARSET',
        message: 'Request body could not be read',
      });
    });

    it('should hide hashing failures behind a generic 500', async () => {
      const { app } = buildTestApp({
        hasher: {
          hash: vi.fn(async () => Promise.reject(new HashingError('argon2 binding missing'))),
          verify: vi.fn(async () => false),
        },
      });

      const response = await request(app)
        .post('/auth/register')
        .send({ name: 'Ann', email: 'a@x.com', password: 'secret123' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      });
    });

    it('should hide store failures behind a generic 500', async () => {
      const { app } = buildTestApp({
        sessions: {
          withSession: vi.fn(async () => Promise.reject(new Error('connection terminated'))),
        },
      });

      const response = await request(app)
        .post('/auth/login')
        .send({ email: 'a@x.com', password: 'secret123' });

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('Internal server error');
    });
  });

  describe('GET /docs.json', () => {
    it('should describe the auth and summaries endpoints', async () => {
      const { app } = buildTestApp();

      const response = await request(app).get('/docs.json');

      expect(response.status).toBe(200);
      expect(Object.keys(response.body.paths).sort()).toEqual([
        '/auth/login',
        '/auth/me',
        '/auth/register',
        '/summaries',
      ]);
    });
  });
});
