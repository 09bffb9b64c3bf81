/**
 * Subscription aggregate
 *
 * The Subscription is the aggregate root: payment events and membership
 * intents belong to exactly one subscription and never outlive it.
 */

/**
 * Lifecycle states. `expired` and `canceled` are terminal.
 */
export enum SubscriptionState {
  PENDING = 'pending',
  ACTIVE = 'active',
  GRACE_PERIOD = 'grace_period',
  EXPIRED = 'expired',
  CANCELED = 'canceled',
}

export const OPEN_SUBSCRIPTION_STATES: readonly SubscriptionState[] = [
  SubscriptionState.PENDING,
  SubscriptionState.ACTIVE,
  SubscriptionState.GRACE_PERIOD,
];

export const isTerminalState = (state: SubscriptionState): boolean =>
  state === SubscriptionState.EXPIRED || state === SubscriptionState.CANCELED;

export interface Subscription {
  id: string;

  /**
   * Chat-platform user id. Unique among open (non-terminal) subscriptions.
   */
  userId: string;

  planId: string;

  /**
   * Price snapshot taken when the subscription was created, in minor units
   */
  amountMinor: number;
  currency: string;
  billingPeriodDays: number;

  state: SubscriptionState;

  /**
   * End of the paid period; null until the first charge succeeds
   */
  currentPeriodEnd: Date | null;

  autoRenew: boolean;

  /**
   * Payment backend that owns the recurring charge (e.g. 'stripe')
   */
  providerName: string;

  /**
   * Opaque provider-side subscription reference, once known
   */
  providerSubscriptionRef: string | null;

  createdAt: Date;
  updatedAt: Date;
}
