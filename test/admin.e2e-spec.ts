import request from 'supertest';
import { createE2eApp, E2eApp } from './support/e2e-app';

const ADMIN_AUTH = 'Bearer test-admin-token';

describe('Admin (e2e)', () => {
  let ctx: E2eApp;

  const http = () => request(ctx.app.getHttpServer());

  beforeAll(async () => {
    ctx = await createE2eApp();
  });

  afterAll(async () => {
    await ctx.app.close();
  });

  it('rejects requests without the admin token', async () => {
    const response = await http().post('/api/admin/membership-sync').expect(401);

    expect(response.body.message).toBe('Authorization header required');
  });

  it('rejects a wrong admin token', async () => {
    const response = await http()
      .post('/api/admin/membership-sync')
      .set('authorization', 'Bearer not-the-token')
      .expect(401);

    expect(response.body.message).toBe('Invalid admin token');
  });

  describe('failed membership intents', () => {
    let intentId: string;

    beforeAll(async () => {
      const started = await http()
        .post('/api/subscriptions')
        .send({ userId: 'blocked-user' })
        .expect(201);
      await ctx
        .sendWebhook({
          id: 'evt_admin_paid',
          type: 'charge.succeeded',
          subscriptionId: started.body.subscription.id,
        })
        .expect(200);
      ctx.groupManager.respondWith({
        ok: false,
        transient: false,
        message: 'user has blocked the bot',
      });
    });

    it('POST /api/admin/membership-sync records a permanent failure', async () => {
      const response = await http()
        .post('/api/admin/membership-sync')
        .set('authorization', ADMIN_AUTH)
        .expect(200);

      expect(response.body).toEqual({
        claimed: 1,
        applied: 0,
        retried: 0,
        failed: 1,
        superseded: 0,
      });
    });

    it('GET /api/admin/membership-intents/failed lists it', async () => {
      const response = await http()
        .get('/api/admin/membership-intents/failed?limit=10')
        .set('authorization', ADMIN_AUTH)
        .expect(200);

      expect(response.body.total).toBe(1);
      expect(response.body.intents).toEqual([
        expect.objectContaining({
          userId: 'blocked-user',
          desiredState: 'member',
          status: 'failed',
          attemptCount: 1,
          nextAttemptAt: null,
          lastError: 'user has blocked the bot',
        }),
      ]);
      intentId = response.body.intents[0].id;
    });

    it('GET /api/admin/membership-intents/failed validates the limit', async () => {
      await http()
        .get('/api/admin/membership-intents/failed?limit=0')
        .set('authorization', ADMIN_AUTH)
        .expect(400);
    });

    it('POST /api/admin/membership-intents/:id/retry re-queues and applies it', async () => {
      const response = await http()
        .post(`/api/admin/membership-intents/${intentId}/retry`)
        .set('authorization', ADMIN_AUTH)
        .expect(200);

      expect(response.body.intent).toMatchObject({
        id: intentId,
        status: 'pending',
        attemptCount: 0,
      });
      expect(response.body.sync).toEqual({
        claimed: 1,
        applied: 1,
        retried: 0,
        failed: 0,
        superseded: 0,
      });
      expect(ctx.groupManager.calls).toEqual([
        { action: 'add', userId: 'blocked-user' },
        { action: 'add', userId: 'blocked-user' },
      ]);
    });

    it('POST /api/admin/membership-intents/:id/retry answers 404 once nothing failed', async () => {
      await http()
        .post(`/api/admin/membership-intents/${intentId}/retry`)
        .set('authorization', ADMIN_AUTH)
        .expect(404);
    });

    it('POST /api/admin/membership-intents/:id/retry rejects a malformed id', async () => {
      await http()
        .post('/api/admin/membership-intents/not-a-uuid/retry')
        .set('authorization', ADMIN_AUTH)
        .expect(400);
    });
  });

  it('POST /api/admin/sweeps/renewal runs a sweep', async () => {
    const response = await http()
      .post('/api/admin/sweeps/renewal')
      .set('authorization', ADMIN_AUTH)
      .expect(200);

    expect(response.body).toMatchObject({
      graceExpired: 0,
      periodsExpired: 0,
      renewalsInitiated: 0,
      errors: 0,
      aborted: false,
    });
  });

  it('PUT /api/admin/plans/:planId/price rejects a zero price', async () => {
    await http()
      .put('/api/admin/plans/default/price')
      .set('authorization', ADMIN_AUTH)
      .send({ amountMinor: 0 })
      .expect(400);
  });

  it('PUT /api/admin/plans/:planId/price answers 404 for an unknown plan', async () => {
    const response = await http()
      .put('/api/admin/plans/gold/price')
      .set('authorization', ADMIN_AUTH)
      .send({ amountMinor: 1299 })
      .expect(404);

    expect(response.body.error).toBe('plan_not_found');
  });

  it('PUT /api/admin/plans/:planId/price prices later subscriptions', async () => {
    const updated = await http()
      .put('/api/admin/plans/default/price')
      .set('authorization', ADMIN_AUTH)
      .send({ amountMinor: 1299, currency: 'eur' })
      .expect(200);

    expect(updated.body).toMatchObject({
      id: 'default',
      amountMinor: 1299,
      returningAmountMinor: null,
      currency: 'EUR',
      billingPeriodDays: 30,
    });

    const started = await http()
      .post('/api/subscriptions')
      .send({ userId: 'late-joiner' })
      .expect(201);

    expect(started.body.subscription).toMatchObject({
      amountMinor: 1299,
      currency: 'EUR',
    });
  });
});
