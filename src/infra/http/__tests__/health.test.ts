import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../app.js';
import { createInMemoryRepos } from '../../../test/inMemoryRepos.js';
import { testConfig } from '../../../test/helpers.js';

describe('GET /healthz', () => {
  it('returns 200 when the database answers', async () => {
    const app = createApp({
      config: testConfig(),
      ...createInMemoryRepos(),
      healthCheck: () => Promise.resolve(),
    });

    const res = await request(app).get('/healthz');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  it('returns 500 when the database check fails', async () => {
    const app = createApp({
      config: testConfig(),
      ...createInMemoryRepos(),
      healthCheck: () => Promise.reject(new Error('connection refused')),
    });

    const res = await request(app).get('/healthz');
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
  });

  it('needs no token', async () => {
    const app = createApp({ config: testConfig(), ...createInMemoryRepos() });

    const res = await request(app).get('/healthz');
    expect(res.status).toBe(200);
  });
});

describe('GET /docs.json', () => {
  it('serves the OpenAPI document built from the route annotations', async () => {
    const app = createApp({ config: testConfig(), ...createInMemoryRepos() });

    const res = await request(app).get('/docs.json');
    expect(res.status).toBe(200);
    expect(res.body.info.title).toBe('NUGAMOTO API');
    expect(res.body.paths).toHaveProperty(['/api/auth/register']);
  });
});
