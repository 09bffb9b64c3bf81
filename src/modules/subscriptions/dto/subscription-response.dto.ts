/**
 * Response shapes for the subscription endpoints
 */

import { PaymentSession, Subscription, SubscriptionState } from '../../../domain/subscriptions';
import { SubscriptionStatusView } from '../lifecycle.service';

export interface SubscriptionResponseDto {
  id: string;
  userId: string;
  planId: string;
  state: SubscriptionState;
  amountMinor: number;
  currency: string;
  billingPeriodDays: number;
  currentPeriodEnd: string | null;
  autoRenew: boolean;
  providerName: string;
  createdAt: string;
  updatedAt: string;
}

export interface StartSubscriptionResponseDto {
  subscription: SubscriptionResponseDto;
  reused: boolean;
  payment: PaymentSession | null;
  /**
   * Set when the provider could not create the payment; the client may
   * retry the same request, which reuses the pending subscription
   */
  paymentError: { kind: string; message: string; retryable: boolean } | null;
}

export interface SubscriptionStatusResponseDto {
  subscriptionId: string;
  userId: string;
  planId: string;
  state: SubscriptionState;
  hasAccess: boolean;
  currentPeriodEnd: string | null;
  daysLeft: number | null;
  autoRenew: boolean;
  amountMinor: number;
  currency: string;
}

export const toSubscriptionResponse = (
  subscription: Subscription,
): SubscriptionResponseDto => ({
  id: subscription.id,
  userId: subscription.userId,
  planId: subscription.planId,
  state: subscription.state,
  amountMinor: subscription.amountMinor,
  currency: subscription.currency,
  billingPeriodDays: subscription.billingPeriodDays,
  currentPeriodEnd: subscription.currentPeriodEnd?.toISOString() ?? null,
  autoRenew: subscription.autoRenew,
  providerName: subscription.providerName,
  createdAt: subscription.createdAt.toISOString(),
  updatedAt: subscription.updatedAt.toISOString(),
});

export const toStatusResponse = (
  view: SubscriptionStatusView,
): SubscriptionStatusResponseDto => ({
  ...view,
  currentPeriodEnd: view.currentPeriodEnd?.toISOString() ?? null,
});
