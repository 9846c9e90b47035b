import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app.js';
import { createMemoryStores, type MemoryStores } from '../test/memory-stores.js';
import { bearer, seedUser, TEST_PASSWORD } from '../test/helpers.js';
import { issueToken, verifyToken } from '../utils/token.js';
import type { User } from '../repositories/types.js';

describe('auth routes', () => {
  let stores: MemoryStores;
  let app: Express;
  let alice: User;

  beforeEach(async () => {
    stores = createMemoryStores();
    app = createApp(stores);
    alice = await seedUser(stores, 'alice');
  });

  describe('POST /api/v1/token', () => {
    it('issues a token pair for form-encoded credentials', async () => {
      const res = await request(app)
        .post('/api/v1/token')
        .type('form')
        .send({ username: 'alice@example.com', password: TEST_PASSWORD });

      expect(res.status).toBe(200);
      expect(res.body.token_type).toBe('bearer');
      expect(verifyToken(res.body.access_token, 'access')).toEqual({ userId: alice.id, type: 'access' });
      expect(verifyToken(res.body.refresh_token, 'refresh')).toEqual({ userId: alice.id, type: 'refresh' });
    });

    it('accepts JSON credentials too', async () => {
      const res = await request(app)
        .post('/api/v1/token')
        .send({ username: 'alice@example.com', password: TEST_PASSWORD });

      expect(res.status).toBe(200);
    });

    it('rejects a wrong password or unknown e-mail with the same message', async () => {
      const wrongPassword = await request(app)
        .post('/api/v1/token')
        .type('form')
        .send({ username: 'alice@example.com', password: 'Wrong-pass1' });
      const unknownEmail = await request(app)
        .post('/api/v1/token')
        .type('form')
        .send({ username: 'nobody@example.com', password: TEST_PASSWORD });

      expect(wrongPassword.status).toBe(401);
      expect(wrongPassword.body).toEqual({ error: 'Incorrect email or password' });
      expect(wrongPassword.headers['www-authenticate']).toBe('Bearer');
      expect(unknownEmail.status).toBe(401);
      expect(unknownEmail.body).toEqual({ error: 'Incorrect email or password' });
    });

    it('rejects a disabled account', async () => {
      await seedUser(stores, 'dora', { isActive: false });

      const res = await request(app)
        .post('/api/v1/token')
        .type('form')
        .send({ username: 'dora@example.com', password: TEST_PASSWORD });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'User account is disabled' });
    });

    it('validates the form fields', async () => {
      const res = await request(app).post('/api/v1/token').type('form').send({ username: 'alice@example.com' });

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([{ field: 'password', message: 'Required' }]);
    });
  });

  describe('POST /api/v1/token/refresh', () => {
    it('exchanges a refresh token for a new pair', async () => {
      const res = await request(app)
        .post('/api/v1/token/refresh')
        .send({ refresh_token: issueToken(alice.id, 'refresh') });

      expect(res.status).toBe(200);
      expect(verifyToken(res.body.access_token, 'access')?.userId).toBe(alice.id);
    });

    it('refuses an access token', async () => {
      const res = await request(app)
        .post('/api/v1/token/refresh')
        .send({ refresh_token: issueToken(alice.id, 'access') });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Invalid refresh token' });
    });

    it('refuses a deactivated user', async () => {
      await stores.users.update(alice.id, { isActive: false });

      const res = await request(app)
        .post('/api/v1/token/refresh')
        .send({ refresh_token: issueToken(alice.id, 'refresh') });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'User is inactive or deleted' });
    });
  });

  describe('authentication gate', () => {
    it('serves the health check without a token', async () => {
      const res = await request(app).get('/api/v1/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
    });

    it('refuses a refresh token on a protected route', async () => {
      const res = await request(app)
        .get('/api/v1/friends')
        .set('Authorization', `Bearer ${issueToken(alice.id, 'refresh')}`);

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Invalid or expired token' });
    });

    it('refuses tokens of inactive or removed users', async () => {
      const token = bearer(alice);
      await stores.users.update(alice.id, { isActive: false });

      const inactive = await request(app).get('/api/v1/friends').set('Authorization', token);
      const unknown = await request(app)
        .get('/api/v1/friends')
        .set('Authorization', `Bearer ${issueToken(999, 'access')}`);

      expect(inactive.status).toBe(401);
      expect(inactive.body).toEqual({ error: 'User account inactive or not found' });
      expect(unknown.status).toBe(401);
    });

    it('answers unknown routes with 404 once authenticated', async () => {
      const res = await request(app).get('/api/v1/nothing-here').set('Authorization', bearer(alice));

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Route GET /api/v1/nothing-here not found' });
    });
  });
});
