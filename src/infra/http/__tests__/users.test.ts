import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from '../app.js';
import { createInMemoryRepos } from '../../../test/inMemoryRepos.js';
import { testConfig } from '../../../test/helpers.js';
import { bearer, registerUser, type TestSession } from '../../../test/http.js';

describe('Users API', () => {
  let app: Application;
  let demo: TestSession;
  let other: TestSession;
  let boss: TestSession;

  beforeEach(async () => {
    app = createApp({
      config: testConfig({ ADMIN_EMAIL_DOMAINS: 'admins.test' }),
      ...createInMemoryRepos(),
    });
    demo = await registerUser(app, 'demo@example.com', 'Demo');
    other = await registerUser(app, 'other@example.com', 'Other');
    boss = await registerUser(app, 'boss@admins.test', 'Boss');
  });

  describe('/api/users/me', () => {
    it('should return the own profile without the password hash', async () => {
      const response = await request(app).get('/api/users/me').set('Authorization', bearer(demo));

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        id: demo.userId,
        name: 'Demo',
        email: 'demo@example.com',
        dietType: null,
      });
      expect(response.body).not.toHaveProperty('passwordHash');
    });

    it('should update the own profile', async () => {
      const response = await request(app)
        .patch('/api/users/me')
        .set('Authorization', bearer(demo))
        .send({ dietType: 'vegan', allergies: '' });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ dietType: 'vegan', allergies: null });
    });

    it('should reject a diet type longer than 50 characters', async () => {
      const response = await request(app)
        .patch('/api/users/me')
        .set('Authorization', bearer(demo))
        .send({ dietType: 'v'.repeat(51) });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.details.issues[0].path).toBe('dietType');
    });

    it('should reject an email longer than 255 characters', async () => {
      const response = await request(app)
        .patch('/api/users/me')
        .set('Authorization', bearer(demo))
        .send({ email: `${'a'.repeat(244)}@example.com` });

      expect(response.status).toBe(400);
      expect(response.body.details.issues[0].path).toBe('email');
    });

    it('should refuse an email taken by another user', async () => {
      const response = await request(app)
        .patch('/api/users/me')
        .set('Authorization', bearer(demo))
        .send({ email: 'other@example.com' });

      expect(response.status).toBe(409);
      expect(response.body).toHaveProperty('code', 'CONFLICT');
    });
  });

  describe('GET /api/users', () => {
    it('should list users for admins', async () => {
      const response = await request(app)
        .get('/api/users?limit=2&offset=0')
        .set('Authorization', bearer(boss));

      expect(response.status).toBe(200);
      expect(response.body.map((u: { email: string }) => u.email)).toEqual([
        'demo@example.com',
        'other@example.com',
      ]);
    });

    it('should forbid regular users', async () => {
      const response = await request(app).get('/api/users').set('Authorization', bearer(demo));

      expect(response.status).toBe(403);
      expect(response.body).toEqual({ code: 'FORBIDDEN', message: 'Admin privileges required' });
    });

    it('should validate paging', async () => {
      const response = await request(app)
        .get('/api/users?limit=500')
        .set('Authorization', bearer(boss));

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });
  });

  describe('/api/users/:userId', () => {
    it('should let a user read their own profile', async () => {
      const response = await request(app)
        .get(`/api/users/${demo.userId}`)
        .set('Authorization', bearer(demo));

      expect(response.status).toBe(200);
      expect(response.body.email).toBe('demo@example.com');
    });

    it("should forbid reading someone else's profile", async () => {
      const response = await request(app)
        .get(`/api/users/${other.userId}`)
        .set('Authorization', bearer(demo));

      expect(response.status).toBe(403);
      expect(response.body).toEqual({
        code: 'FORBIDDEN',
        message: 'You are not allowed to access this resource',
      });
    });

    it('should let an admin read any profile', async () => {
      const response = await request(app)
        .get(`/api/users/${other.userId}`)
        .set('Authorization', bearer(boss));

      expect(response.status).toBe(200);
      expect(response.body.email).toBe('other@example.com');
    });

    it('should not let an admin edit another profile', async () => {
      const response = await request(app)
        .patch(`/api/users/${other.userId}`)
        .set('Authorization', bearer(boss))
        .send({ name: 'Renamed' });

      expect(response.status).toBe(403);
    });

    it('should let a user edit their own profile by id', async () => {
      const response = await request(app)
        .patch(`/api/users/${demo.userId}`)
        .set('Authorization', bearer(demo))
        .send({ name: 'Renamed' });

      expect(response.status).toBe(200);
      expect(response.body.name).toBe('Renamed');
    });

    it('should reject an id that is not a UUID', async () => {
      const response = await request(app)
        .get('/api/users/not-a-uuid')
        .set('Authorization', bearer(boss));

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });

    it('should list the kitchens of a user for themselves only', async () => {
      await request(app)
        .post('/api/kitchens')
        .set('Authorization', bearer(demo))
        .send({ name: 'Home' });

      const own = await request(app)
        .get(`/api/users/${demo.userId}/kitchens`)
        .set('Authorization', bearer(demo));
      expect(own.status).toBe(200);
      expect(own.body).toHaveLength(1);
      expect(own.body[0]).toMatchObject({ name: 'Home', role: 'owner' });

      const foreign = await request(app)
        .get(`/api/users/${demo.userId}/kitchens`)
        .set('Authorization', bearer(other));
      expect(foreign.status).toBe(403);
    });
  });
});
