import { MembershipDesiredState, SubscriptionState } from '../../domain/subscriptions';
import { DAY_MS, seedSubscription } from '../../../test/support/fixtures';
import { reload } from '../../../test/support/flows';
import {
  createServiceHarness,
  ServiceHarness,
} from '../../../test/support/service-harness';

const now = new Date('2024-04-01T00:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;

describe('RenewalSweeperService', () => {
  let harness: ServiceHarness;

  beforeEach(async () => {
    harness = await createServiceHarness({
      RENEWAL_LOOKAHEAD_HOURS: 24,
      GRACE_PERIOD_DAYS: 2,
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await harness.close();
  });

  it('should request a renewal charge once per period', async () => {
    const periodEnd = new Date(now.getTime() + 6 * HOUR_MS);
    const subscription = await seedSubscription(harness.store, {
      state: SubscriptionState.ACTIVE,
      currentPeriodEnd: periodEnd,
      providerSubscriptionRef: 'sim_sub_1',
    });

    const first = await harness.sweeper.runSweep(now);
    const second = await harness.sweeper.runSweep(new Date(now.getTime() + HOUR_MS));

    expect(first).toMatchObject({ renewalsInitiated: 1, renewalFailures: 0, errors: 0 });
    expect(second.renewalsInitiated).toBe(1);
    expect(harness.simulation.listCalls('recurring_charge')).toEqual([
      expect.objectContaining({
        subscriptionId: subscription.id,
        idempotencyKey: `${subscription.id}:renewal:${periodEnd.toISOString()}`,
        amountMinor: 999,
      }),
    ]);
    expect((await reload(harness, subscription.id)).state).toBe(SubscriptionState.ACTIVE);
  });

  it('should leave subscriptions outside the lookahead alone', async () => {
    await seedSubscription(harness.store, {
      state: SubscriptionState.ACTIVE,
      currentPeriodEnd: new Date(now.getTime() + 2 * DAY_MS),
    });

    const report = await harness.sweeper.runSweep(now);

    expect(report.renewalsInitiated).toBe(0);
    expect(harness.simulation.listCalls()).toEqual([]);
  });

  it('should count a failed renewal request and keep the subscription active', async () => {
    const subscription = await seedSubscription(harness.store, {
      state: SubscriptionState.ACTIVE,
      currentPeriodEnd: new Date(now.getTime() + HOUR_MS),
    });
    harness.simulation.failNextCall('network');

    const report = await harness.sweeper.runSweep(now);

    expect(report).toMatchObject({ renewalsInitiated: 0, renewalFailures: 1 });
    expect((await reload(harness, subscription.id)).state).toBe(SubscriptionState.ACTIVE);
  });

  it('should only wait for the webhook when the provider bills renewals itself', async () => {
    jest
      .spyOn(harness.simulation, 'getCapabilities')
      .mockReturnValue({ managesRenewals: true });
    const renewing = await seedSubscription(harness.store, {
      userId: 'renewing',
      state: SubscriptionState.ACTIVE,
      currentPeriodEnd: new Date(now.getTime() - DAY_MS),
    });
    const ended = await seedSubscription(harness.store, {
      userId: 'ended',
      state: SubscriptionState.ACTIVE,
      autoRenew: false,
      currentPeriodEnd: new Date(now.getTime() - HOUR_MS),
    });

    const report = await harness.sweeper.runSweep(now);

    expect(report).toMatchObject({
      renewalsInitiated: 0,
      renewalFailures: 0,
      periodsExpired: 1,
      errors: 0,
    });
    expect(harness.simulation.listCalls('recurring_charge')).toEqual([]);
    expect((await reload(harness, renewing.id)).state).toBe(SubscriptionState.ACTIVE);
    expect((await reload(harness, ended.id)).state).toBe(SubscriptionState.EXPIRED);
  });

  it('should expire every lapsed period however small the batch', async () => {
    const small = await createServiceHarness({
      RENEWAL_LOOKAHEAD_HOURS: 24,
      SWEEP_BATCH_SIZE: 1,
    });
    try {
      const renewing = await seedSubscription(small.store, {
        userId: 'renewing',
        state: SubscriptionState.ACTIVE,
        currentPeriodEnd: new Date(now.getTime() - 2 * DAY_MS),
      });
      const endedFirst = await seedSubscription(small.store, {
        userId: 'ended-first',
        state: SubscriptionState.ACTIVE,
        autoRenew: false,
        currentPeriodEnd: new Date(now.getTime() - DAY_MS),
      });
      const endedLast = await seedSubscription(small.store, {
        userId: 'ended-last',
        state: SubscriptionState.ACTIVE,
        autoRenew: false,
        currentPeriodEnd: new Date(now.getTime() - HOUR_MS),
      });

      const report = await small.sweeper.runSweep(now);

      expect(report).toMatchObject({
        periodsExpired: 2,
        renewalsInitiated: 1,
        errors: 0,
        skipped: 0,
      });
      expect((await reload(small, endedFirst.id)).state).toBe(SubscriptionState.EXPIRED);
      expect((await reload(small, endedLast.id)).state).toBe(SubscriptionState.EXPIRED);
      expect(
        small.simulation.listCalls('recurring_charge').map((call) => call.subscriptionId),
      ).toEqual([renewing.id]);
    } finally {
      await small.close();
    }
  });

  it('should expire grace periods whose window has passed', async () => {
    const lapsed = await seedSubscription(harness.store, {
      userId: 'lapsed',
      state: SubscriptionState.GRACE_PERIOD,
      currentPeriodEnd: new Date(now.getTime() - 2 * DAY_MS),
    });
    const stillInGrace = await seedSubscription(harness.store, {
      userId: 'in-grace',
      state: SubscriptionState.GRACE_PERIOD,
      currentPeriodEnd: new Date(now.getTime() - DAY_MS),
    });

    const report = await harness.sweeper.runSweep(now);

    expect(report.graceExpired).toBe(1);
    expect((await reload(harness, lapsed.id)).state).toBe(SubscriptionState.EXPIRED);
    expect((await reload(harness, stillInGrace.id)).state).toBe(
      SubscriptionState.GRACE_PERIOD,
    );
    expect(await harness.store.listMembershipIntents(lapsed.id)).toEqual([
      expect.objectContaining({
        userId: 'lapsed',
        desiredState: MembershipDesiredState.REMOVED,
      }),
    ]);
  });

  it('should expire an ended period when auto-renew is off', async () => {
    const ended = await seedSubscription(harness.store, {
      userId: 'ended',
      state: SubscriptionState.ACTIVE,
      autoRenew: false,
      currentPeriodEnd: new Date(now.getTime() - HOUR_MS),
    });
    const running = await seedSubscription(harness.store, {
      userId: 'running',
      state: SubscriptionState.ACTIVE,
      autoRenew: false,
      currentPeriodEnd: new Date(now.getTime() + HOUR_MS),
    });

    const report = await harness.sweeper.runSweep(now);

    expect(report).toMatchObject({ periodsExpired: 1, renewalsInitiated: 0 });
    expect((await reload(harness, ended.id)).state).toBe(SubscriptionState.EXPIRED);
    expect((await reload(harness, running.id)).state).toBe(SubscriptionState.ACTIVE);
    expect(harness.simulation.listCalls()).toEqual([]);
  });

  it('should report a candidate that fails and carry on', async () => {
    await seedSubscription(harness.store, {
      userId: 'broken',
      state: SubscriptionState.GRACE_PERIOD,
      currentPeriodEnd: new Date(now.getTime() - 3 * DAY_MS),
    });
    const healthy = await seedSubscription(harness.store, {
      userId: 'healthy',
      state: SubscriptionState.ACTIVE,
      currentPeriodEnd: new Date(now.getTime() + HOUR_MS),
    });
    jest
      .spyOn(harness.lifecycle, 'expireGraceWindow')
      .mockRejectedValueOnce(new Error('store offline'));

    const report = await harness.sweeper.runSweep(now);

    expect(report).toMatchObject({ errors: 1, graceExpired: 0, renewalsInitiated: 1 });
    expect(harness.simulation.listCalls('recurring_charge')[0].subscriptionId).toBe(
      healthy.id,
    );
  });

  it('should hand back the running sweep instead of starting another', async () => {
    const first = harness.sweeper.runSweep(now);

    expect(harness.sweeper.isRunning()).toBe(true);
    expect(harness.sweeper.runSweep(now)).toBe(first);
    await first;
    expect(harness.sweeper.isRunning()).toBe(false);
  });
});
