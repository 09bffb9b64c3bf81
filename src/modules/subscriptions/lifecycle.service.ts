import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import {
  ConcurrentModificationError,
  SubscriptionConflictError,
  SubscriptionNotFoundError,
} from '../../core/errors/subscription.errors';
import { ProcessingLimitsService } from '../../core/limits/processing-limits.service';
import { logger } from '../../core/logger/logger.config';
import { exponentialBackoff } from '../../core/utils/delay.util';
import {
  GatewayError,
  idempotencyKey,
  isTerminalState,
  LifecycleEvent,
  MembershipChange,
  MembershipDesiredState,
  MembershipIntent,
  MembershipIntentStatus,
  nextPeriodEnd,
  PaymentGateway,
  PaymentSession,
  Plan,
  StoreTransaction,
  Subscription,
  SubscriptionState,
  SubscriptionStore,
  transition,
} from '../../domain/subscriptions';
import { SUBSCRIPTION_STORE } from '../../store/store.tokens';
import { MembershipSyncService } from '../membership/membership-sync.service';
import { PAYMENT_GATEWAY } from '../providers/payment-gateway.tokens';
import { PlansService } from './plans.service';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AppliedTransition {
  subscription: Subscription;
  previousState: SubscriptionState;
  event: LifecycleEvent;
  /**
   * false when the subscription was already terminal and the event was absorbed
   */
  changed: boolean;
  intent: MembershipIntent | null;
}

export interface TransitionOptions {
  occurredAt: Date;
  providerSubscriptionRef?: string | null;
}

export interface StartSubscriptionResult {
  subscription: Subscription;
  reused: boolean;
  payment: PaymentSession | null;
  paymentError: GatewayError | null;
}

export interface SubscriptionStatusView {
  subscriptionId: string;
  userId: string;
  planId: string;
  state: SubscriptionState;
  hasAccess: boolean;
  currentPeriodEnd: Date | null;
  daysLeft: number | null;
  autoRenew: boolean;
  amountMinor: number;
  currency: string;
}

/**
 * Owns the subscription state machine. Every state change goes through
 * `applyTransition` inside a store transaction holding the row lock.
 */
@Injectable()
export class LifecycleService {
  private readonly logger = logger();

  constructor(
    @Inject(SUBSCRIPTION_STORE) private readonly store: SubscriptionStore,
    @Inject(PAYMENT_GATEWAY) private readonly gateway: PaymentGateway,
    private readonly plansService: PlansService,
    private readonly membershipSync: MembershipSyncService,
    private readonly limitsService: ProcessingLimitsService,
  ) {}

  /**
   * Runs `work` in a store transaction, retrying lock contention with
   * exponential backoff
   */
  async withTransaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const maxRetries = this.limitsService.getTransactionMaxRetries();

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.store.transaction(work);
      } catch (error) {
        if (!(error instanceof ConcurrentModificationError) || attempt >= maxRetries) {
          throw error;
        }
        this.logger.warn(
          { attempt: attempt + 1, maxRetries, error: error.message },
          'Lock contention, retrying transaction',
        );
        await exponentialBackoff(attempt, 50, 1000);
      }
    }
  }

  /**
   * Applies one lifecycle event to a subscription the caller has locked in `tx`
   *
   * @throws InvalidTransitionError when the event is not allowed in the current state
   */
  async applyTransition(
    tx: StoreTransaction,
    subscription: Subscription,
    event: LifecycleEvent,
    options: TransitionOptions,
  ): Promise<AppliedTransition> {
    const outcome = transition(subscription.state, event);
    const previousState = subscription.state;

    if (!outcome.changed) {
      this.logger.debug(
        { subscriptionId: subscription.id, state: previousState, event },
        'Event absorbed by terminal subscription',
      );
      return { subscription, previousState, event, changed: false, intent: null };
    }

    const now = new Date();
    const saved = await tx.updateSubscription({
      ...subscription,
      state: outcome.nextState,
      currentPeriodEnd: outcome.extendsPeriod
        ? nextPeriodEnd(
            subscription.currentPeriodEnd,
            options.occurredAt,
            subscription.billingPeriodDays,
          )
        : subscription.currentPeriodEnd,
      providerSubscriptionRef:
        subscription.providerSubscriptionRef ??
        options.providerSubscriptionRef ??
        null,
      updatedAt: now,
    });

    const intent = outcome.membership
      ? await tx.insertMembershipIntent(
          this.buildIntent(saved, outcome.membership, now),
        )
      : null;

    this.logger.info(
      {
        subscriptionId: saved.id,
        userId: saved.userId,
        event,
        from: previousState,
        to: saved.state,
        currentPeriodEnd: saved.currentPeriodEnd,
        membership: outcome.membership,
      },
      'Subscription transitioned',
    );

    return { subscription: saved, previousState, event, changed: true, intent };
  }

  /**
   * Call once the transaction that produced `applied` has committed
   */
  afterCommit(applied: AppliedTransition | null): void {
    if (applied?.intent) {
      this.membershipSync.notifyIntentsWritten();
    }
  }

  async startSubscription(
    userId: string,
    planId?: string,
  ): Promise<StartSubscriptionResult> {
    const plan = await this.plansService.getPlan(planId);
    const pending = await this.createOrReusePending(userId, plan);
    const reused = pending.reused;
    let subscription = pending.subscription;

    const payment = await this.gateway.createPayment({
      subscriptionId: subscription.id,
      userId,
      amountMinor: subscription.amountMinor,
      currency: subscription.currency,
      billingPeriodDays: subscription.billingPeriodDays,
      description: `${plan.name} (${subscription.billingPeriodDays} days)`,
      idempotencyKey: idempotencyKey(subscription.id, 'initial', subscription.createdAt),
    });

    if (!payment.ok) {
      this.logger.warn(
        { subscriptionId: subscription.id, userId, error: payment.error },
        'Payment could not be created; the pending subscription can be retried',
      );
      return { subscription, reused, payment: null, paymentError: payment.error };
    }

    const ref = payment.value.providerSubscriptionRef;
    if (ref && !subscription.providerSubscriptionRef) {
      subscription = await this.recordProviderRef(subscription.id, ref);
    }

    this.logger.info(
      { subscriptionId: subscription.id, userId, reused, paymentId: payment.value.paymentId },
      'Subscription checkout started',
    );
    return { subscription, reused, payment: payment.value, paymentError: null };
  }

  async cancel(userId: string): Promise<Subscription> {
    const open = await this.requireOpenSubscription(userId);

    const applied = await this.withTransaction(async (tx) => {
      const locked = await tx.lockSubscription(open.id);
      if (!locked) {
        throw new SubscriptionNotFoundError(`Subscription ${open.id} not found`);
      }
      return this.applyTransition(tx, locked, LifecycleEvent.USER_CANCEL, {
        occurredAt: new Date(),
      });
    });
    this.afterCommit(applied);

    const { subscription } = applied;
    if (applied.changed && subscription.providerSubscriptionRef) {
      const result = await this.gateway.cancelRecurringCharge({
        subscriptionId: subscription.id,
        providerSubscriptionRef: subscription.providerSubscriptionRef,
        idempotencyKey: idempotencyKey(subscription.id, 'cancel', subscription.updatedAt),
        atPeriodEnd: false,
        reason: 'user_cancel',
      });
      if (!result.ok) {
        this.logger.error(
          {
            alert: 'provider_cancel_failed',
            subscriptionId: subscription.id,
            providerSubscriptionRef: subscription.providerSubscriptionRef,
            error: result.error,
          },
          'Subscription canceled locally but the provider charge could not be stopped',
        );
      }
    }

    return subscription;
  }

  /**
   * Turning auto-renew off lets the paid period run out; the sweeper then
   * expires the subscription. Providers that bill renewals themselves are
   * told to stop at period end.
   */
  async setAutoRenew(userId: string, enabled: boolean): Promise<Subscription> {
    const open = await this.requireOpenSubscription(userId);
    const managedByProvider = this.gateway.getCapabilities().managesRenewals;

    const { changed, subscription } = await this.withTransaction(async (tx) => {
      const locked = await tx.lockSubscription(open.id);
      if (!locked || isTerminalState(locked.state)) {
        throw new SubscriptionNotFoundError(`User ${userId} has no open subscription`);
      }
      if (locked.autoRenew === enabled) {
        return { changed: false, subscription: locked };
      }
      if (enabled && managedByProvider && locked.providerSubscriptionRef) {
        throw new SubscriptionConflictError(
          'Auto-renew cannot be re-enabled once the provider has scheduled the cancellation',
        );
      }
      const updated = await tx.updateSubscription({
        ...locked,
        autoRenew: enabled,
        updatedAt: new Date(),
      });
      return { changed: true, subscription: updated };
    });

    if (!changed) {
      return subscription;
    }
    this.logger.info(
      { subscriptionId: subscription.id, userId, autoRenew: enabled },
      'Auto-renew updated',
    );

    if (!enabled && managedByProvider && subscription.providerSubscriptionRef) {
      const result = await this.gateway.cancelRecurringCharge({
        subscriptionId: subscription.id,
        providerSubscriptionRef: subscription.providerSubscriptionRef,
        idempotencyKey: idempotencyKey(
          subscription.id,
          'cancel',
          subscription.currentPeriodEnd ?? subscription.createdAt,
        ),
        atPeriodEnd: true,
        reason: 'auto_renew_disabled',
      });
      if (!result.ok) {
        this.logger.error(
          {
            alert: 'provider_cancel_failed',
            subscriptionId: subscription.id,
            error: result.error,
          },
          'Auto-renew disabled locally but the provider could not be updated',
        );
      }
    }

    return subscription;
  }

  async getStatus(
    userId: string,
    now: Date = new Date(),
  ): Promise<SubscriptionStatusView | null> {
    const subscription =
      (await this.store.findOpenSubscription(userId)) ??
      (await this.store.findLatestSubscription(userId));
    return subscription ? this.toStatusView(subscription, now) : null;
  }

  toStatusView(subscription: Subscription, now: Date): SubscriptionStatusView {
    const periodEnd = subscription.currentPeriodEnd;
    return {
      subscriptionId: subscription.id,
      userId: subscription.userId,
      planId: subscription.planId,
      state: subscription.state,
      hasAccess:
        subscription.state === SubscriptionState.ACTIVE ||
        subscription.state === SubscriptionState.GRACE_PERIOD,
      currentPeriodEnd: periodEnd,
      daysLeft: periodEnd
        ? Math.max(0, Math.ceil((periodEnd.getTime() - now.getTime()) / DAY_MS))
        : null,
      autoRenew: subscription.autoRenew,
      amountMinor: subscription.amountMinor,
      currency: subscription.currency,
    };
  }

  /**
   * Expires a grace-period subscription once its grace window has passed.
   * Returns null when the subscription is no longer eligible.
   */
  async expireGraceWindow(
    subscriptionId: string,
    now: Date,
  ): Promise<AppliedTransition | null> {
    const { gracePeriodMs } = this.limitsService.getSweepLimits();

    const applied = await this.withTransaction(async (tx) => {
      const locked = await tx.lockSubscription(subscriptionId);
      if (
        !locked ||
        locked.state !== SubscriptionState.GRACE_PERIOD ||
        !locked.currentPeriodEnd ||
        locked.currentPeriodEnd.getTime() + gracePeriodMs > now.getTime()
      ) {
        return null;
      }
      return this.applyTransition(tx, locked, LifecycleEvent.GRACE_WINDOW_ELAPSED, {
        occurredAt: now,
      });
    });
    this.afterCommit(applied);
    return applied;
  }

  /**
   * Expires an active subscription whose owner turned auto-renew off and
   * whose paid period is over. Returns null when no longer eligible.
   */
  async expireLapsedPeriod(
    subscriptionId: string,
    now: Date,
  ): Promise<AppliedTransition | null> {
    const applied = await this.withTransaction(async (tx) => {
      const locked = await tx.lockSubscription(subscriptionId);
      if (
        !locked ||
        locked.state !== SubscriptionState.ACTIVE ||
        locked.autoRenew ||
        !locked.currentPeriodEnd ||
        locked.currentPeriodEnd.getTime() > now.getTime()
      ) {
        return null;
      }
      return this.applyTransition(tx, locked, LifecycleEvent.PERIOD_ELAPSED, {
        occurredAt: now,
      });
    });
    this.afterCommit(applied);
    return applied;
  }

  private async createOrReusePending(
    userId: string,
    plan: Plan,
  ): Promise<{ subscription: Subscription; reused: boolean }> {
    const open = await this.store.findOpenSubscription(userId);
    if (open) {
      return { subscription: this.assertReusable(open), reused: true };
    }

    const now = new Date();
    const candidate: Subscription = {
      id: randomUUID(),
      userId,
      planId: plan.id,
      amountMinor: await this.plansService.quotePrice(plan, userId),
      currency: plan.currency,
      billingPeriodDays: plan.billingPeriodDays,
      state: SubscriptionState.PENDING,
      currentPeriodEnd: null,
      autoRenew: true,
      providerName: this.gateway.providerName,
      providerSubscriptionRef: null,
      createdAt: now,
      updatedAt: now,
    };

    try {
      const subscription = await this.withTransaction((tx) =>
        tx.insertSubscription(candidate),
      );
      this.logger.info(
        { subscriptionId: subscription.id, userId, amountMinor: subscription.amountMinor },
        'Pending subscription created',
      );
      return { subscription, reused: false };
    } catch (error) {
      if (!(error instanceof SubscriptionConflictError)) throw error;
      // lost a race with a concurrent start for the same user
      const winner = await this.store.findOpenSubscription(userId);
      if (!winner) throw error;
      return { subscription: this.assertReusable(winner), reused: true };
    }
  }

  private assertReusable(open: Subscription): Subscription {
    if (open.state !== SubscriptionState.PENDING) {
      throw new SubscriptionConflictError(
        `User ${open.userId} already has a ${open.state} subscription`,
      );
    }
    return open;
  }

  private async recordProviderRef(
    subscriptionId: string,
    providerSubscriptionRef: string,
  ): Promise<Subscription> {
    return this.withTransaction(async (tx) => {
      const locked = await tx.lockSubscription(subscriptionId);
      if (!locked) {
        throw new SubscriptionNotFoundError(`Subscription ${subscriptionId} not found`);
      }
      if (locked.providerSubscriptionRef) return locked;
      return tx.updateSubscription({
        ...locked,
        providerSubscriptionRef,
        updatedAt: new Date(),
      });
    });
  }

  private async requireOpenSubscription(userId: string): Promise<Subscription> {
    const open = await this.store.findOpenSubscription(userId);
    if (!open) {
      throw new SubscriptionNotFoundError(`User ${userId} has no open subscription`);
    }
    return open;
  }

  private buildIntent(
    subscription: Subscription,
    change: MembershipChange,
    now: Date,
  ): MembershipIntent {
    return {
      id: randomUUID(),
      subscriptionId: subscription.id,
      userId: subscription.userId,
      desiredState:
        change === 'grant'
          ? MembershipDesiredState.MEMBER
          : MembershipDesiredState.REMOVED,
      applied: false,
      status: MembershipIntentStatus.PENDING,
      attemptCount: 0,
      lastAttemptAt: null,
      nextAttemptAt: now,
      lastError: null,
      createdAt: now,
    };
  }
}
