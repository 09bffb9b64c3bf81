/**
 * Transactional persistence for the subscription aggregate
 *
 * The store is the single source of truth and the only coordination point
 * between concurrent request handlers and the sweeper. Every subscription
 * mutation happens inside `transaction()` after `lockSubscription()` has taken
 * the row-level exclusive lock for that id.
 */

import {
  IntentFailureUpdate,
  MembershipIntent,
  PaymentEvent,
  Plan,
  Subscription,
} from '../models';

export type SweepCandidateKind = 'renewal' | 'lapsed' | 'grace';

/**
 * Keyset position of the last row of the previous page
 */
export interface SweepCursor {
  currentPeriodEnd: Date;
  id: string;
}

export interface SweepPage {
  periodEndBefore: Date;
  limit: number;
  after?: SweepCursor;
}

export interface StoreTransaction {
  /**
   * Takes the exclusive row lock (held until commit/rollback) and returns the
   * current committed row, or null when it does not exist.
   *
   * @throws ConcurrentModificationError when the lock cannot be acquired in time
   */
  lockSubscription(id: string): Promise<Subscription | null>;

  /**
   * @throws SubscriptionConflictError when the user already has an open subscription
   */
  insertSubscription(subscription: Subscription): Promise<Subscription>;

  updateSubscription(subscription: Subscription): Promise<Subscription>;

  findPaymentEvent(providerEventId: string): Promise<PaymentEvent | null>;

  /**
   * @throws DuplicateEventError when the provider event id is already recorded
   */
  insertPaymentEvent(event: PaymentEvent): Promise<PaymentEvent>;

  markPaymentEventProcessed(id: string, processedAt: Date): Promise<void>;

  /**
   * Inserts the intent and marks older pending intents of the same user as
   * superseded, whichever subscription they belong to
   */
  insertMembershipIntent(intent: MembershipIntent): Promise<MembershipIntent>;
}

export interface SubscriptionStore {
  /**
   * Runs `work` in one transaction. Throwing rolls back every write.
   */
  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;

  findSubscriptionById(id: string): Promise<Subscription | null>;

  /**
   * The user's open (pending, active or grace_period) subscription
   */
  findOpenSubscription(userId: string): Promise<Subscription | null>;

  /**
   * Most recently created subscription of the user, in any state
   */
  findLatestSubscription(userId: string): Promise<Subscription | null>;

  /**
   * True when the user has a subscription that was paid and then ended
   */
  hasEndedSubscription(userId: string): Promise<boolean>;

  findSubscriptionByProviderRef(
    providerName: string,
    providerSubscriptionRef: string,
  ): Promise<Subscription | null>;

  /**
   * One page of sweep work whose period ends at or before `periodEndBefore`,
   * ordered by (currentPeriodEnd, id) and starting after `after`:
   * - `renewal`: active with auto-renew on
   * - `lapsed`: active with auto-renew off
   * - `grace`: in the grace period
   */
  findSweepCandidates(
    kind: SweepCandidateKind,
    page: SweepPage,
  ): Promise<Subscription[]>;

  findPaymentEvent(providerEventId: string): Promise<PaymentEvent | null>;

  listPaymentEvents(subscriptionId: string): Promise<PaymentEvent[]>;

  listMembershipIntents(subscriptionId: string): Promise<MembershipIntent[]>;

  /**
   * Atomically leases due pending intents so concurrent workers never
   * process the same one; the lease moves nextAttemptAt to `leaseUntil`
   */
  claimDueIntents(
    now: Date,
    limit: number,
    leaseUntil: Date,
  ): Promise<MembershipIntent[]>;

  /**
   * Newest intent of the user by creation time, in any status
   */
  findLatestIntent(userId: string): Promise<MembershipIntent | null>;

  markIntentApplied(id: string, appliedAt: Date): Promise<void>;

  /**
   * Moves a pending intent to superseded; other statuses are left alone
   */
  markIntentSuperseded(id: string): Promise<void>;

  recordIntentFailure(id: string, update: IntentFailureUpdate): Promise<void>;

  listFailedIntents(limit: number): Promise<MembershipIntent[]>;

  countFailedIntents(): Promise<number>;

  /**
   * Moves a failed intent back to pending with a fresh attempt budget.
   * Returns null when the intent does not exist or is not failed.
   */
  requeueFailedIntent(id: string, now: Date): Promise<MembershipIntent | null>;

  findPlan(id: string): Promise<Plan | null>;

  savePlan(plan: Plan): Promise<Plan>;

  ping(): Promise<boolean>;
}
