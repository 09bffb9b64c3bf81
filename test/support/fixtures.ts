import { randomUUID } from 'node:crypto';
import {
  MembershipDesiredState,
  MembershipIntent,
  MembershipIntentStatus,
  Subscription,
  SubscriptionState,
  SubscriptionStore,
} from '../../src/domain/subscriptions';

export const DAY_MS = 24 * 60 * 60 * 1000;

export const buildSubscription = (
  overrides: Partial<Subscription> = {},
): Subscription => {
  const createdAt = overrides.createdAt ?? new Date('2024-03-01T00:00:00.000Z');
  return {
    id: randomUUID(),
    userId: 'user-1',
    planId: 'default',
    amountMinor: 999,
    currency: 'USD',
    billingPeriodDays: 30,
    state: SubscriptionState.PENDING,
    currentPeriodEnd: null,
    autoRenew: true,
    providerName: 'simulation',
    providerSubscriptionRef: null,
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
};

export const buildIntent = (
  overrides: Partial<MembershipIntent> = {},
): MembershipIntent => {
  const createdAt = overrides.createdAt ?? new Date('2024-03-01T00:00:00.000Z');
  return {
    id: randomUUID(),
    subscriptionId: randomUUID(),
    userId: 'user-1',
    desiredState: MembershipDesiredState.MEMBER,
    applied: false,
    status: MembershipIntentStatus.PENDING,
    attemptCount: 0,
    lastAttemptAt: null,
    nextAttemptAt: createdAt,
    lastError: null,
    createdAt,
    ...overrides,
  };
};

export const seedSubscription = (
  store: SubscriptionStore,
  overrides: Partial<Subscription> = {},
): Promise<Subscription> =>
  store.transaction((tx) => tx.insertSubscription(buildSubscription(overrides)));

export const seedIntent = (
  store: SubscriptionStore,
  overrides: Partial<MembershipIntent> = {},
): Promise<MembershipIntent> =>
  store.transaction((tx) => tx.insertMembershipIntent(buildIntent(overrides)));
