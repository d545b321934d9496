import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import {
  setupTestApp,
  teardownTestApp,
  createTestUser,
  type TestContext,
  type TestUser,
} from '../../test/test-app.js';

describe('Option Routes', () => {
  let ctx: TestContext;
  let app: Express;
  let user: TestUser;

  beforeEach(() => {
    ctx = setupTestApp();
    app = ctx.app;
    user = createTestUser(ctx.db);
  });

  afterEach(() => {
    teardownTestApp(ctx);
  });

  it('should list option types', async () => {
    const response = await request(app).get('/api/options/types').set('Authorization', user.auth);

    expect(response.status).toBe(200);
    expect(response.body.data).toContainEqual({ type: 'collab_type', label: 'Collaboration Type' });
  });

  it('should add a custom choice', async () => {
    const created = await request(app)
      .post('/api/options')
      .set('Authorization', user.auth)
      .send({ option_type: 'collab_type', label: 'Giveaway' });
    expect(created.status).toBe(201);
    expect(created.body.data).toMatchObject({ option_type: 'collab_type', value: 'giveaway', label: 'Giveaway' });

    const choices = await request(app).get('/api/options/collab_type').set('Authorization', user.auth);
    expect(choices.body.data.at(-1)).toEqual({ value: 'giveaway', label: 'Giveaway', is_custom: true });
  });

  it('should return 409 for a duplicate choice', async () => {
    const response = await request(app)
      .post('/api/options')
      .set('Authorization', user.auth)
      .send({ option_type: 'collab_type', label: 'Cross Promo' });

    expect(response.status).toBe(409);
    expect(response.body.code).toBe('CONFLICT');
  });

  it('should return 400 for an unknown option type', async () => {
    const response = await request(app).get('/api/options/colours').set('Authorization', user.auth);

    expect(response.status).toBe(400);
    expect(response.body.code).toBe('VALIDATION_ERROR');
  });

  it('should delete a custom choice', async () => {
    const created = await request(app)
      .post('/api/options')
      .set('Authorization', user.auth)
      .send({ option_type: 'deal_type', label: 'Barter' });

    await request(app)
      .delete(`/api/options/${created.body.data.id}`)
      .set('Authorization', user.auth)
      .expect(204);

    const listed = await request(app).get('/api/options').set('Authorization', user.auth);
    expect(listed.body.data.deal_type).toEqual([]);
  });
});
