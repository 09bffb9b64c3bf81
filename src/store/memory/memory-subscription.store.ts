import {
  DuplicateEventError,
  SubscriptionConflictError,
} from '../../core/errors/subscription.errors';
import {
  IntentFailureUpdate,
  isTerminalState,
  MembershipIntent,
  MembershipIntentStatus,
  PaymentEvent,
  Plan,
  StoreTransaction,
  Subscription,
  SubscriptionState,
  SubscriptionStore,
  SweepCandidateKind,
  SweepCursor,
  SweepPage,
} from '../../domain/subscriptions';
import { KeyedLock, LockRelease } from './keyed-lock';

interface MemoryTables {
  subscriptions: Map<string, Subscription>;
  /** keyed by providerEventId */
  paymentEvents: Map<string, PaymentEvent>;
  intents: Map<string, MembershipIntent>;
  plans: Map<string, Plan>;
}

export interface MemoryStoreOptions {
  lockTimeoutMs: number;
}

const copy = <T extends object>(value: T): T => ({ ...value });

const byCreatedAt = (
  a: { createdAt: Date },
  b: { createdAt: Date },
): number => a.createdAt.getTime() - b.createdAt.getTime();

const periodEndOf = (subscription: Subscription): number =>
  subscription.currentPeriodEnd?.getTime() ?? 0;

const byPeriodEndThenId = (a: Subscription, b: Subscription): number =>
  periodEndOf(a) - periodEndOf(b) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

const endsAtOrBefore = (subscription: Subscription, limit: Date): boolean =>
  subscription.currentPeriodEnd !== null &&
  subscription.currentPeriodEnd.getTime() <= limit.getTime();

const isAfterCursor = (
  subscription: Subscription,
  after?: SweepCursor,
): boolean => {
  if (!after) return true;
  const end = periodEndOf(subscription);
  const cursorEnd = after.currentPeriodEnd.getTime();
  return end > cursorEnd || (end === cursorEnd && subscription.id > after.id);
};

const matchesSweepKind = (
  subscription: Subscription,
  kind: SweepCandidateKind,
): boolean => {
  switch (kind) {
    case 'renewal':
      return (
        subscription.state === SubscriptionState.ACTIVE && subscription.autoRenew
      );
    case 'lapsed':
      return (
        subscription.state === SubscriptionState.ACTIVE && !subscription.autoRenew
      );
    case 'grace':
      return subscription.state === SubscriptionState.GRACE_PERIOD;
  }
};

/**
 * Writes are buffered and become visible only on commit, so a failing
 * unit of work leaves the committed tables untouched.
 */
class MemoryStoreTransaction implements StoreTransaction {
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly paymentEvents = new Map<string, PaymentEvent>();
  private readonly intents = new Map<string, MembershipIntent>();
  private readonly newestIntentByUser = new Map<string, string>();
  private readonly lockedIds = new Set<string>();
  private readonly releases: LockRelease[] = [];

  constructor(
    private readonly tables: MemoryTables,
    private readonly locks: KeyedLock,
    private readonly lockTimeoutMs: number,
  ) {}

  async lockSubscription(id: string): Promise<Subscription | null> {
    await this.acquire(id);
    const row = this.subscriptions.get(id) ?? this.tables.subscriptions.get(id);
    return row ? copy(row) : null;
  }

  async insertSubscription(subscription: Subscription): Promise<Subscription> {
    if (
      this.subscriptions.has(subscription.id) ||
      this.tables.subscriptions.has(subscription.id)
    ) {
      throw new Error(`Subscription ${subscription.id} already exists`);
    }
    this.assertSingleOpen(subscription);
    await this.acquire(subscription.id);
    this.subscriptions.set(subscription.id, copy(subscription));
    return copy(subscription);
  }

  async updateSubscription(subscription: Subscription): Promise<Subscription> {
    if (!this.lockedIds.has(subscription.id)) {
      throw new Error(
        `Subscription ${subscription.id} must be locked before it is updated`,
      );
    }
    this.assertSingleOpen(subscription);
    this.subscriptions.set(subscription.id, copy(subscription));
    return copy(subscription);
  }

  async findPaymentEvent(providerEventId: string): Promise<PaymentEvent | null> {
    const event =
      this.paymentEvents.get(providerEventId) ??
      this.tables.paymentEvents.get(providerEventId);
    return event ? copy(event) : null;
  }

  async insertPaymentEvent(event: PaymentEvent): Promise<PaymentEvent> {
    if (await this.findPaymentEvent(event.providerEventId)) {
      throw new DuplicateEventError(event.providerEventId);
    }
    this.paymentEvents.set(event.providerEventId, copy(event));
    return copy(event);
  }

  async markPaymentEventProcessed(id: string, processedAt: Date): Promise<void> {
    const buffered = [...this.paymentEvents.values()].find((e) => e.id === id);
    const committed = [...this.tables.paymentEvents.values()].find(
      (e) => e.id === id,
    );
    const event = buffered ?? committed;
    if (!event) {
      throw new Error(`Payment event ${id} not found`);
    }
    this.paymentEvents.set(event.providerEventId, { ...event, processedAt });
  }

  async insertMembershipIntent(
    intent: MembershipIntent,
  ): Promise<MembershipIntent> {
    for (const [id, buffered] of this.intents) {
      if (
        buffered.userId === intent.userId &&
        buffered.status === MembershipIntentStatus.PENDING
      ) {
        this.intents.set(id, {
          ...buffered,
          status: MembershipIntentStatus.SUPERSEDED,
        });
      }
    }
    this.intents.set(intent.id, copy(intent));
    this.newestIntentByUser.set(intent.userId, intent.id);
    return copy(intent);
  }

  /**
   * Re-checks uniqueness against rows committed while this transaction ran,
   * then publishes every buffered write at once.
   */
  commit(): void {
    for (const subscription of this.subscriptions.values()) {
      this.assertSingleOpen(subscription);
    }
    for (const event of this.paymentEvents.values()) {
      const committed = this.tables.paymentEvents.get(event.providerEventId);
      if (committed && committed.id !== event.id) {
        throw new DuplicateEventError(event.providerEventId);
      }
    }

    for (const [id, subscription] of this.subscriptions) {
      this.tables.subscriptions.set(id, subscription);
    }
    for (const [providerEventId, event] of this.paymentEvents) {
      this.tables.paymentEvents.set(providerEventId, event);
    }
    for (const [userId, newestId] of this.newestIntentByUser) {
      for (const [id, intent] of this.tables.intents) {
        if (
          intent.userId === userId &&
          intent.status === MembershipIntentStatus.PENDING &&
          id !== newestId
        ) {
          this.tables.intents.set(id, {
            ...intent,
            status: MembershipIntentStatus.SUPERSEDED,
          });
        }
      }
    }
    for (const [id, intent] of this.intents) {
      this.tables.intents.set(id, intent);
    }
  }

  release(): void {
    for (const release of this.releases.reverse()) {
      release();
    }
    this.releases.length = 0;
  }

  private async acquire(id: string): Promise<void> {
    if (this.lockedIds.has(id)) return;
    this.releases.push(
      await this.locks.acquire(`subscription:${id}`, this.lockTimeoutMs),
    );
    this.lockedIds.add(id);
  }

  private assertSingleOpen(subscription: Subscription): void {
    if (isTerminalState(subscription.state)) return;

    const ids = new Set([
      ...this.tables.subscriptions.keys(),
      ...this.subscriptions.keys(),
    ]);
    for (const id of ids) {
      if (id === subscription.id) continue;
      const other = this.subscriptions.get(id) ?? this.tables.subscriptions.get(id);
      if (
        other &&
        other.userId === subscription.userId &&
        !isTerminalState(other.state)
      ) {
        throw new SubscriptionConflictError(
          `User ${subscription.userId} already has an open subscription`,
        );
      }
    }
  }
}

/**
 * Process-local store used by the test suites and by single-instance
 * deployments that run with STORE_DRIVER=memory
 */
export class MemorySubscriptionStore implements SubscriptionStore {
  private readonly tables: MemoryTables = {
    subscriptions: new Map(),
    paymentEvents: new Map(),
    intents: new Map(),
    plans: new Map(),
  };
  private readonly locks = new KeyedLock();

  constructor(private readonly options: MemoryStoreOptions) {}

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const tx = new MemoryStoreTransaction(
      this.tables,
      this.locks,
      this.options.lockTimeoutMs,
    );
    try {
      const result = await work(tx);
      tx.commit();
      return result;
    } finally {
      tx.release();
    }
  }

  async findSubscriptionById(id: string): Promise<Subscription | null> {
    const row = this.tables.subscriptions.get(id);
    return row ? copy(row) : null;
  }

  async findOpenSubscription(userId: string): Promise<Subscription | null> {
    const row = this.subscriptionRows().find(
      (s) => s.userId === userId && !isTerminalState(s.state),
    );
    return row ? copy(row) : null;
  }

  async findLatestSubscription(userId: string): Promise<Subscription | null> {
    const rows = this.subscriptionRows()
      .filter((s) => s.userId === userId)
      .sort(byCreatedAt);
    const latest = rows[rows.length - 1];
    return latest ? copy(latest) : null;
  }

  async hasEndedSubscription(userId: string): Promise<boolean> {
    return this.subscriptionRows().some(
      (s) =>
        s.userId === userId &&
        (s.state === SubscriptionState.EXPIRED ||
          (s.state === SubscriptionState.CANCELED && s.currentPeriodEnd !== null)),
    );
  }

  async findSubscriptionByProviderRef(
    providerName: string,
    providerSubscriptionRef: string,
  ): Promise<Subscription | null> {
    const rows = this.subscriptionRows()
      .filter(
        (s) =>
          s.providerName === providerName &&
          s.providerSubscriptionRef === providerSubscriptionRef,
      )
      .sort(byCreatedAt);
    const latest = rows[rows.length - 1];
    return latest ? copy(latest) : null;
  }

  async findSweepCandidates(
    kind: SweepCandidateKind,
    page: SweepPage,
  ): Promise<Subscription[]> {
    return this.subscriptionRows()
      .filter(
        (s) =>
          matchesSweepKind(s, kind) &&
          endsAtOrBefore(s, page.periodEndBefore) &&
          isAfterCursor(s, page.after),
      )
      .sort(byPeriodEndThenId)
      .slice(0, page.limit)
      .map(copy);
  }

  async findPaymentEvent(providerEventId: string): Promise<PaymentEvent | null> {
    const event = this.tables.paymentEvents.get(providerEventId);
    return event ? copy(event) : null;
  }

  async listPaymentEvents(subscriptionId: string): Promise<PaymentEvent[]> {
    return [...this.tables.paymentEvents.values()]
      .filter((e) => e.subscriptionId === subscriptionId)
      .sort((a, b) => a.receivedAt.getTime() - b.receivedAt.getTime())
      .map(copy);
  }

  async listMembershipIntents(
    subscriptionId: string,
  ): Promise<MembershipIntent[]> {
    return [...this.tables.intents.values()]
      .filter((i) => i.subscriptionId === subscriptionId)
      .sort(byCreatedAt)
      .map(copy);
  }

  async claimDueIntents(
    now: Date,
    limit: number,
    leaseUntil: Date,
  ): Promise<MembershipIntent[]> {
    const due = [...this.tables.intents.values()]
      .filter(
        (i) =>
          i.status === MembershipIntentStatus.PENDING &&
          i.nextAttemptAt.getTime() <= now.getTime(),
      )
      .sort(byCreatedAt)
      .slice(0, limit);

    return due.map((intent) => {
      const leased = { ...intent, nextAttemptAt: leaseUntil };
      this.tables.intents.set(intent.id, leased);
      return copy(leased);
    });
  }

  async findLatestIntent(userId: string): Promise<MembershipIntent | null> {
    const intents = [...this.tables.intents.values()]
      .filter((i) => i.userId === userId)
      .sort(byCreatedAt);
    const latest = intents[intents.length - 1];
    return latest ? copy(latest) : null;
  }

  async markIntentApplied(id: string, appliedAt: Date): Promise<void> {
    const intent = this.tables.intents.get(id);
    if (!intent) return;
    this.tables.intents.set(id, {
      ...intent,
      applied: true,
      lastAttemptAt: appliedAt,
      status:
        intent.status === MembershipIntentStatus.PENDING
          ? MembershipIntentStatus.APPLIED
          : intent.status,
    });
  }

  async markIntentSuperseded(id: string): Promise<void> {
    const intent = this.tables.intents.get(id);
    if (!intent || intent.status !== MembershipIntentStatus.PENDING) return;
    this.tables.intents.set(id, {
      ...intent,
      status: MembershipIntentStatus.SUPERSEDED,
    });
  }

  async recordIntentFailure(
    id: string,
    update: IntentFailureUpdate,
  ): Promise<void> {
    const intent = this.tables.intents.get(id);
    if (!intent || intent.status !== MembershipIntentStatus.PENDING) return;
    this.tables.intents.set(id, {
      ...intent,
      attemptCount: update.attemptCount,
      lastAttemptAt: update.attemptedAt,
      lastError: update.error,
      nextAttemptAt: update.nextAttemptAt ?? intent.nextAttemptAt,
      status: update.nextAttemptAt
        ? MembershipIntentStatus.PENDING
        : MembershipIntentStatus.FAILED,
    });
  }

  async listFailedIntents(limit: number): Promise<MembershipIntent[]> {
    return this.failedIntents().slice(0, limit).map(copy);
  }

  async countFailedIntents(): Promise<number> {
    return this.failedIntents().length;
  }

  async requeueFailedIntent(
    id: string,
    now: Date,
  ): Promise<MembershipIntent | null> {
    const intent = this.tables.intents.get(id);
    if (!intent || intent.status !== MembershipIntentStatus.FAILED) return null;
    const requeued: MembershipIntent = {
      ...intent,
      status: MembershipIntentStatus.PENDING,
      attemptCount: 0,
      nextAttemptAt: now,
    };
    this.tables.intents.set(id, requeued);
    return copy(requeued);
  }

  async findPlan(id: string): Promise<Plan | null> {
    const plan = this.tables.plans.get(id);
    return plan ? copy(plan) : null;
  }

  async savePlan(plan: Plan): Promise<Plan> {
    this.tables.plans.set(plan.id, copy(plan));
    return copy(plan);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  private subscriptionRows(): Subscription[] {
    return [...this.tables.subscriptions.values()];
  }

  private failedIntents(): MembershipIntent[] {
    return [...this.tables.intents.values()]
      .filter((i) => i.status === MembershipIntentStatus.FAILED)
      .sort(byCreatedAt);
  }
}
