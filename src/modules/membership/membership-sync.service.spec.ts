import {
  MembershipDesiredState,
  MembershipIntentStatus,
} from '../../domain/subscriptions';
import { seedIntent } from '../../../test/support/fixtures';
import { activeSubscription } from '../../../test/support/flows';
import {
  createServiceHarness,
  ServiceHarness,
} from '../../../test/support/service-harness';

const now = new Date('2024-03-01T12:00:00.000Z');
const due = new Date(now.getTime() - 1000);

describe('MembershipSyncService', () => {
  let harness: ServiceHarness;

  beforeEach(async () => {
    harness = await createServiceHarness({
      MEMBERSHIP_SYNC_BACKOFF_BASE_MS: 1000,
      MEMBERSHIP_SYNC_BACKOFF_MAX_MS: 60000,
      MEMBERSHIP_SYNC_MAX_ATTEMPTS: 3,
    });
  });

  afterEach(async () => {
    await harness.close();
  });

  const intentById = async (subscriptionId: string, id: string) => {
    const intent = (await harness.store.listMembershipIntents(subscriptionId)).find(
      (candidate) => candidate.id === id,
    );
    if (!intent) throw new Error(`intent ${id} missing`);
    return intent;
  };

  it('should apply due intents and mark them applied', async () => {
    const grant = await seedIntent(harness.store, {
      subscriptionId: 'sub-1',
      userId: 'user-1',
      nextAttemptAt: due,
    });
    const revoke = await seedIntent(harness.store, {
      subscriptionId: 'sub-2',
      userId: 'user-2',
      desiredState: MembershipDesiredState.REMOVED,
      nextAttemptAt: due,
    });

    const report = await harness.membershipSync.runOnce(now);

    expect(report).toEqual({
      claimed: 2,
      applied: 2,
      retried: 0,
      failed: 0,
      superseded: 0,
    });
    expect(harness.groupManager.calls).toEqual([
      { action: 'add', userId: 'user-1' },
      { action: 'remove', userId: 'user-2' },
    ]);
    expect(await intentById('sub-1', grant.id)).toMatchObject({
      applied: true,
      status: MembershipIntentStatus.APPLIED,
      lastAttemptAt: now,
    });
    expect((await intentById('sub-2', revoke.id)).status).toBe(
      MembershipIntentStatus.APPLIED,
    );
  });

  it('should leave intents that are not due yet', async () => {
    await seedIntent(harness.store, { nextAttemptAt: new Date(now.getTime() + 1) });

    expect(await harness.membershipSync.runOnce(now)).toEqual({
      claimed: 0,
      applied: 0,
      retried: 0,
      failed: 0,
      superseded: 0,
    });
    expect(harness.groupManager.calls).toEqual([]);
  });

  it('should schedule a transient failure with exponential backoff', async () => {
    const intent = await seedIntent(harness.store, {
      subscriptionId: 'sub-1',
      nextAttemptAt: due,
      attemptCount: 1,
    });
    harness.groupManager.respondWith({
      ok: false,
      transient: true,
      message: 'Bad Gateway',
    });

    const report = await harness.membershipSync.runOnce(now);

    expect(report).toEqual({
      claimed: 1,
      applied: 0,
      retried: 1,
      failed: 0,
      superseded: 0,
    });
    expect(await intentById('sub-1', intent.id)).toMatchObject({
      status: MembershipIntentStatus.PENDING,
      applied: false,
      attemptCount: 2,
      lastError: 'Bad Gateway',
      lastAttemptAt: now,
      nextAttemptAt: new Date(now.getTime() + 2000),
    });
  });

  it('should wait at least as long as the group API asks', async () => {
    const intent = await seedIntent(harness.store, {
      subscriptionId: 'sub-1',
      nextAttemptAt: due,
    });
    harness.groupManager.respondWith({
      ok: false,
      transient: true,
      message: 'Too Many Requests',
      retryAfterMs: 45000,
    });

    await harness.membershipSync.runOnce(now);

    expect((await intentById('sub-1', intent.id)).nextAttemptAt).toEqual(
      new Date(now.getTime() + 45000),
    );
  });

  it('should give up on a permanent failure right away', async () => {
    const intent = await seedIntent(harness.store, {
      subscriptionId: 'sub-1',
      nextAttemptAt: due,
    });
    harness.groupManager.respondWith({
      ok: false,
      transient: false,
      message: 'Bad Request: user not found',
    });

    const report = await harness.membershipSync.runOnce(now);

    expect(report.failed).toBe(1);
    expect(await intentById('sub-1', intent.id)).toMatchObject({
      status: MembershipIntentStatus.FAILED,
      attemptCount: 1,
      lastError: 'Bad Request: user not found',
    });
    expect(await harness.store.countFailedIntents()).toBe(1);
  });

  it('should give up once the attempt budget is spent', async () => {
    const intent = await seedIntent(harness.store, {
      subscriptionId: 'sub-1',
      nextAttemptAt: due,
      attemptCount: 2,
    });
    harness.groupManager.respondWith({ ok: false, transient: true, message: 'timeout' });

    const report = await harness.membershipSync.runOnce(now);

    expect(report).toEqual({
      claimed: 1,
      applied: 0,
      retried: 0,
      failed: 1,
      superseded: 0,
    });
    expect((await intentById('sub-1', intent.id)).status).toBe(
      MembershipIntentStatus.FAILED,
    );
  });

  it('should apply only the newest intent of a user', async () => {
    await seedIntent(harness.store, {
      subscriptionId: 'sub-1',
      nextAttemptAt: due,
      createdAt: new Date(now.getTime() - 2000),
    });
    await seedIntent(harness.store, {
      subscriptionId: 'sub-1',
      desiredState: MembershipDesiredState.REMOVED,
      nextAttemptAt: due,
      createdAt: due,
    });

    const report = await harness.membershipSync.runOnce(now);

    expect(report.claimed).toBe(1);
    expect(harness.groupManager.calls).toEqual([{ action: 'remove', userId: 'user-1' }]);
  });

  it('should keep a returning user in the group after a failed revoke', async () => {
    const first = await activeSubscription(
      harness,
      'user-1',
      new Date('2024-03-01T00:00:00.000Z'),
    );
    await harness.membershipSync.runOnce();

    await harness.lifecycle.cancel('user-1');
    harness.groupManager.respondWith({
      ok: false,
      transient: true,
      message: 'Bad Gateway',
    });
    expect((await harness.membershipSync.runOnce()).retried).toBe(1);

    const second = await activeSubscription(
      harness,
      'user-1',
      new Date('2024-03-05T00:00:00.000Z'),
    );
    const report = await harness.membershipSync.runOnce(
      new Date(Date.now() + 60000),
    );

    expect(report).toEqual({
      claimed: 1,
      applied: 1,
      retried: 0,
      failed: 0,
      superseded: 0,
    });
    expect(harness.groupManager.calls).toEqual([
      { action: 'add', userId: 'user-1' },
      { action: 'remove', userId: 'user-1' },
      { action: 'add', userId: 'user-1' },
    ]);
    expect(harness.groupManager.isMember('user-1')).toBe(true);
    expect(
      (await harness.store.listMembershipIntents(first.id)).map((i) => i.status),
    ).toEqual([MembershipIntentStatus.APPLIED, MembershipIntentStatus.SUPERSEDED]);
    expect(
      (await harness.store.listMembershipIntents(second.id)).map((i) => i.status),
    ).toEqual([MembershipIntentStatus.APPLIED]);
  });

  it('should skip a requeued intent when the user has a newer one', async () => {
    const revoke = await seedIntent(harness.store, {
      subscriptionId: 'sub-1',
      desiredState: MembershipDesiredState.REMOVED,
      status: MembershipIntentStatus.FAILED,
      createdAt: new Date(now.getTime() - 2000),
    });
    await seedIntent(harness.store, {
      subscriptionId: 'sub-2',
      status: MembershipIntentStatus.APPLIED,
      applied: true,
      createdAt: due,
    });
    await harness.store.requeueFailedIntent(revoke.id, due);

    const report = await harness.membershipSync.runOnce(now);

    expect(report).toEqual({
      claimed: 1,
      applied: 0,
      retried: 0,
      failed: 0,
      superseded: 1,
    });
    expect(harness.groupManager.calls).toEqual([]);
    expect((await intentById('sub-1', revoke.id)).status).toBe(
      MembershipIntentStatus.SUPERSEDED,
    );
  });

  it('should lease a claimed batch long enough to work through it', async () => {
    const leased = await createServiceHarness({
      GROUP_API_TIMEOUT_MS: 2000,
      MEMBERSHIP_SYNC_BATCH_SIZE: 4,
    });
    try {
      const claim = jest.spyOn(leased.store, 'claimDueIntents');
      await seedIntent(leased.store, { nextAttemptAt: due });

      await leased.membershipSync.runOnce(now);

      expect(claim).toHaveBeenCalledWith(
        now,
        4,
        new Date(now.getTime() + 2 * 2000 * 4),
      );
    } finally {
      await leased.close();
    }
  });

  it('should treat a thrown group call as transient', async () => {
    const intent = await seedIntent(harness.store, {
      subscriptionId: 'sub-1',
      nextAttemptAt: due,
    });
    jest
      .spyOn(harness.groupManager, 'addMember')
      .mockRejectedValueOnce(new Error('socket hang up'));

    const report = await harness.membershipSync.runOnce(now);

    expect(report.retried).toBe(1);
    expect((await intentById('sub-1', intent.id)).lastError).toBe('socket hang up');
  });

  it('should join a run that is already in progress', async () => {
    await seedIntent(harness.store, { nextAttemptAt: due });

    const first = harness.membershipSync.runOnce(now);
    const second = harness.membershipSync.runOnce(now);

    expect(second).toBe(first);
    expect((await first).applied).toBe(1);
  });
});
