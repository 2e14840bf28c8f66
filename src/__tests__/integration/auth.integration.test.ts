/**
 * Integration Tests: auth flows over HTTP
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createTestApp } from '../mocks/app.mock';
import type { TestApp } from '../mocks/app.mock';
import { tokenFromLink } from '../mocks/services.mock';

describe('Auth API', () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  describe('signup, verification and login', () => {
    it('activates the account through the emailed link and logs in', async () => {
      const signup = await t.request
        .post('/auth/signup')
        .send({ email: 'a@x.com', password: 'pw', name: 'A' })
        .expect(201);

      expect(signup.body.success).toBe(true);
      expect(signup.body.data).toMatchObject({ email: 'a@x.com', name: 'A', is_verified: false });
      expect(JSON.stringify(signup.body)).not.toContain('token');

      const early = await t.request.post('/auth/login').send({ email: 'a@x.com', password: 'pw' });
      expect(early.status).toBe(403);
      expect(early.body.error.code).toBe('NOT_VERIFIED');

      const token = tokenFromLink(t.mailer.verification[0].link);
      const verified = await t.request.get('/auth/verify-email').query({ token }).expect(200);
      expect(verified.body.data.is_verified).toBe(true);

      const login = await t.request
        .post('/auth/login')
        .send({ email: 'a@x.com', password: 'pw' })
        .expect(200);
      expect(login.body.data).toMatchObject({ token_type: 'bearer', expires_in: 1800 });
      expect(typeof login.body.data.access_token).toBe('string');
      expect(typeof login.body.data.refresh_token).toBe('string');

      const me = await t.request
        .get('/users/me')
        .set('Authorization', `Bearer ${login.body.data.access_token}`)
        .expect(200);
      expect(me.body.data).toEqual({
        id: signup.body.data.id,
        email: 'a@x.com',
        name: 'A',
        role: 'user',
        is_verified: true,
        avatar_url: null,
        created_at: '2026-03-10T09:00:00.000Z',
      });
    });

    it('rejects an empty password and one past the bcrypt limit', async () => {
      const empty = await t.request
        .post('/auth/signup')
        .send({ email: 'a@x.com', password: '', name: 'A' })
        .expect(400);
      expect(empty.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        details: [{ field: 'password', message: 'Password must not be empty' }],
      });

      const long = await t.request
        .post('/auth/signup')
        .send({ email: 'a@x.com', password: 'p'.repeat(73), name: 'A' })
        .expect(400);
      expect(long.body.error.details).toEqual([{ field: 'password', message: 'Password must be at most 72 bytes' }]);
    });

    it('rejects a second redemption of the same verification link', async () => {
      await t.request
        .post('/auth/signup')
        .send({ email: 'a@x.com', password: 'pw-long-enough', name: 'A' })
        .expect(201);
      const token = tokenFromLink(t.mailer.verification[0].link);

      await t.request.get('/auth/verify-email').query({ token }).expect(200);
      const again = await t.request.get('/auth/verify-email').query({ token }).expect(401);

      expect(again.body).toEqual({
        success: false,
        message: 'Invalid token',
        error: { code: 'INVALID_TOKEN' },
      });
    });

    it('refuses a verification token as a bearer credential', async () => {
      await t.request
        .post('/auth/signup')
        .send({ email: 'a@x.com', password: 'pw-long-enough', name: 'A' })
        .expect(201);
      const token = tokenFromLink(t.mailer.verification[0].link);

      const res = await t.request.get('/users/me').set('Authorization', `Bearer ${token}`).expect(401);
      expect(res.body.error.code).toBe('WRONG_TOKEN_PURPOSE');
    });

    it('treats emails case-insensitively', async () => {
      await t.registerVerified('ada@example.com');

      const duplicate = await t.request
        .post('/auth/signup')
        .send({ email: 'ADA@Example.com', password: 'pw-long-enough', name: 'Ada' })
        .expect(409);
      expect(duplicate.body.error.code).toBe('EMAIL_TAKEN');

      await t.request.post('/auth/login').send({ email: 'Ada@EXAMPLE.com', password: 'correct-horse-1' }).expect(200);
    });

    it('answers wrong passwords and unknown emails identically', async () => {
      await t.registerVerified('ada@example.com');

      const wrong = await t.request.post('/auth/login').send({ email: 'ada@example.com', password: 'nope-nope' });
      const unknown = await t.request.post('/auth/login').send({ email: 'ghost@example.com', password: 'nope-nope' });

      expect(wrong.status).toBe(401);
      expect(unknown.status).toBe(401);
      expect(wrong.body).toEqual(unknown.body);
      expect(wrong.body.error.code).toBe('INVALID_CREDENTIALS');
    });

    it('rejects an expired access token', async () => {
      await t.registerVerified('ada@example.com');
      const { accessToken } = await t.login('ada@example.com');

      t.clock.advance(1801);

      const res = await t.request.get('/users/me').set('Authorization', `Bearer ${accessToken}`).expect(401);
      expect(res.body.error.code).toBe('TOKEN_EXPIRED');
    });

    it('validates the signup body', async () => {
      const res = await t.request
        .post('/auth/signup')
        .send({ email: 'not-an-email', password: 'pw-long-enough', name: 'A' })
        .expect(400);

      expect(res.body).toEqual({
        success: false,
        message: 'Invalid request data',
        error: {
          code: 'VALIDATION_ERROR',
          details: [{ field: 'email', message: 'Invalid email address' }],
        },
      });
    });

    it('keeps resend quiet for unknown emails and refuses verified ones', async () => {
      await t.request.post('/auth/resend-verification').send({ email: 'ghost@example.com' }).expect(200);
      expect(t.mailer.verification).toHaveLength(0);

      await t.registerVerified('ada@example.com');
      const res = await t.request.post('/auth/resend-verification').send({ email: 'ada@example.com' }).expect(409);
      expect(res.body.error.code).toBe('ALREADY_VERIFIED');
    });

    it('limits signups per client', async () => {
      for (let i = 0; i < 5; i++) {
        await t.request
          .post('/auth/signup')
          .send({ email: `user${i}@example.com`, password: 'pw-long-enough', name: 'User' })
          .expect(201);
      }

      const res = await t.request
        .post('/auth/signup')
        .send({ email: 'user5@example.com', password: 'pw-long-enough', name: 'User' })
        .expect(429);
      expect(res.body.error.code).toBe('RATE_LIMITED');
      expect(res.headers['retry-after']).toBe('900');
    });
  });

  describe('refresh and logout', () => {
    it('rotates refresh tokens and refuses the rotated one', async () => {
      await t.registerVerified('ada@example.com');
      const { refreshToken } = await t.login('ada@example.com');

      const rotated = await t.request.post('/auth/refresh').send({ refresh_token: refreshToken }).expect(200);
      expect(rotated.body.data.refresh_token).not.toBe(refreshToken);

      const replay = await t.request.post('/auth/refresh').send({ refresh_token: refreshToken }).expect(401);
      expect(replay.body.error.code).toBe('TOKEN_REVOKED');

      // the replay revoked the newer token as well
      await t.request.post('/auth/refresh').send({ refresh_token: rotated.body.data.refresh_token }).expect(401);
    });

    it('revokes the refresh token on logout', async () => {
      await t.registerVerified('ada@example.com');
      const { refreshToken, accessToken } = await t.login('ada@example.com');

      await t.request.post('/auth/logout').send({ refresh_token: refreshToken }).expect(200);
      await t.request.post('/auth/logout').send({ refresh_token: refreshToken }).expect(200);

      const res = await t.request.post('/auth/refresh').send({ refresh_token: refreshToken }).expect(401);
      expect(res.body.error.code).toBe('TOKEN_REVOKED');

      const wrongPurpose = await t.request.post('/auth/logout').send({ refresh_token: accessToken }).expect(401);
      expect(wrongPurpose.body.error.code).toBe('WRONG_TOKEN_PURPOSE');
    });
  });

  describe('password reset', () => {
    it('replaces the password and cuts off earlier sessions', async () => {
      await t.registerVerified('ada@example.com');
      const session = await t.login('ada@example.com');

      // populate the cached snapshot
      await t.request.get('/users/me').set('Authorization', `Bearer ${session.accessToken}`).expect(200);

      await t.request.post('/auth/reset-password').send({ email: 'ada@example.com' }).expect(200);
      expect(t.mailer.passwordReset).toHaveLength(1);
      const resetToken = tokenFromLink(t.mailer.passwordReset[0].link);
      expect(t.mailer.passwordReset[0].link.startsWith('http://app.test/reset-password?token=')).toBe(true);

      await t.request
        .post('/auth/reset-password/confirm')
        .send({ token: resetToken, new_password: 'brand-new-pass-2' })
        .expect(200);

      const oldPassword = await t.request
        .post('/auth/login')
        .send({ email: 'ada@example.com', password: 'correct-horse-1' })
        .expect(401);
      expect(oldPassword.body.error.code).toBe('INVALID_CREDENTIALS');

      await t.request.post('/auth/login').send({ email: 'ada@example.com', password: 'brand-new-pass-2' }).expect(200);

      const staleAccess = await t.request
        .get('/users/me')
        .set('Authorization', `Bearer ${session.accessToken}`)
        .expect(401);
      expect(staleAccess.body.error.code).toBe('TOKEN_REVOKED');

      const staleRefresh = await t.request
        .post('/auth/refresh')
        .send({ refresh_token: session.refreshToken })
        .expect(401);
      expect(staleRefresh.body.error.code).toBe('TOKEN_REVOKED');

      const reused = await t.request
        .post('/auth/reset-password/confirm')
        .send({ token: resetToken, new_password: 'third-pass-333' })
        .expect(401);
      expect(reused.body.error.code).toBe('INVALID_TOKEN');
    });

    it('does not reveal whether an account exists', async () => {
      const res = await t.request.post('/auth/reset-password').send({ email: 'ghost@example.com' }).expect(200);

      expect(res.body).toEqual({
        success: true,
        message: 'If the account exists, an email has been sent',
        data: null,
      });
      expect(t.mailer.passwordReset).toHaveLength(0);
    });

    it('expires reset links after an hour', async () => {
      await t.registerVerified('ada@example.com');
      await t.request.post('/auth/reset-password').send({ email: 'ada@example.com' }).expect(200);
      const resetToken = tokenFromLink(t.mailer.passwordReset[0].link);

      t.clock.advance(3601);

      const res = await t.request
        .post('/auth/reset-password/confirm')
        .send({ token: resetToken, new_password: 'brand-new-pass-2' })
        .expect(401);
      expect(res.body.error.code).toBe('TOKEN_EXPIRED');
    });
  });

  describe('plumbing', () => {
    it('requires a bearer token on protected routes', async () => {
      const res = await t.request.get('/users/me').expect(401);
      expect(res.body).toEqual({
        success: false,
        message: 'Not authenticated',
        error: { code: 'UNAUTHORIZED' },
      });
    });

    it('answers unknown routes with the error envelope', async () => {
      const res = await t.request.get('/nope').expect(404);
      expect(res.body).toEqual({
        success: false,
        message: 'Route GET /nope not found',
        error: { code: 'NOT_FOUND' },
      });
    });

    it('refuses browser origins outside the allow list with 403', async () => {
      const res = await t.request.get('/health').set('Origin', 'http://evil.test').expect(403);
      expect(res.body).toEqual({
        success: false,
        message: 'Origin not allowed',
        error: { code: 'FORBIDDEN' },
      });

      await t.request.get('/health').set('Origin', 'http://localhost:5173').expect(200);
    });

    it('rejects malformed JSON', async () => {
      const res = await t.request
        .post('/auth/login')
        .set('Content-Type', 'application/json')
        .send('{"email":')
        .expect(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.message).toBe('Malformed JSON body');
    });

    it('reports dependency health', async () => {
      const healthy = await t.request.get('/health').expect(200);
      expect(healthy.body).toEqual({ status: 'ok', database: 'connected', redis: 'connected' });

      const degraded = createTestApp({ databaseDown: true });
      const res = await degraded.request.get('/health').expect(503);
      expect(res.body).toEqual({ status: 'error', database: 'disconnected', redis: 'connected' });
    });
  });
});
