import { OnApplicationShutdown } from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  In,
  IsNull,
  Not,
  QueryFailedError,
} from 'typeorm';
import {
  ConcurrentModificationError,
  DuplicateEventError,
  errorMessage,
  SubscriptionConflictError,
} from '../../core/errors/subscription.errors';
import { logger } from '../../core/logger/logger.config';
import {
  IntentFailureUpdate,
  MembershipIntent,
  MembershipIntentStatus,
  OPEN_SUBSCRIPTION_STATES,
  PaymentEvent,
  Plan,
  StoreTransaction,
  Subscription,
  SubscriptionState,
  SubscriptionStore,
  SweepCandidateKind,
  SweepPage,
} from '../../domain/subscriptions';
import {
  MembershipIntentEntity,
  PAYMENT_EVENT_UNIQUE_CONSTRAINT,
  PaymentEventEntity,
  PlanEntity,
  SubscriptionEntity,
} from './entities';
import { InitialSchema1717171717000 } from './migrations/1717171717000-InitialSchema';

// Postgres SQLSTATE codes
const UNIQUE_VIOLATION = '23505';
const CONTENTION_CODES = new Set([
  '55P03', // lock_not_available
  '40001', // serialization_failure
  '40P01', // deadlock_detected
]);

const driverErrorField = (
  error: QueryFailedError,
  field: 'code' | 'constraint',
): string | undefined => {
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) return undefined;
  const value: unknown = Reflect.get(driverError, field);
  return typeof value === 'string' ? value : undefined;
};

const translateDriverError = (error: unknown): unknown => {
  if (
    error instanceof QueryFailedError &&
    CONTENTION_CODES.has(driverErrorField(error, 'code') ?? '')
  ) {
    return new ConcurrentModificationError(error.message);
  }
  return error;
};

const isUniqueViolation = (error: unknown, constraint: string): boolean =>
  error instanceof QueryFailedError &&
  driverErrorField(error, 'code') === UNIQUE_VIOLATION &&
  driverErrorField(error, 'constraint') === constraint;

const toSubscription = (entity: SubscriptionEntity): Subscription => ({
  ...entity,
});
const toPaymentEvent = (entity: PaymentEventEntity): PaymentEvent => ({
  ...entity,
});
const toIntent = (entity: MembershipIntentEntity): MembershipIntent => ({
  ...entity,
});
const toPlan = (entity: PlanEntity): Plan => ({ ...entity });

class TypeOrmStoreTransaction implements StoreTransaction {
  constructor(private readonly manager: EntityManager) {}

  async lockSubscription(id: string): Promise<Subscription | null> {
    const row = await this.manager
      .getRepository(SubscriptionEntity)
      .createQueryBuilder('subscription')
      .setLock('pessimistic_write')
      .where('subscription.id = :id', { id })
      .getOne();
    return row ? toSubscription(row) : null;
  }

  async insertSubscription(subscription: Subscription): Promise<Subscription> {
    await this.writeSubscription(() =>
      this.manager.insert(SubscriptionEntity, { ...subscription }),
    );
    return subscription;
  }

  async updateSubscription(subscription: Subscription): Promise<Subscription> {
    const { id, ...fields } = subscription;
    await this.writeSubscription(() =>
      this.manager.update(SubscriptionEntity, { id }, fields),
    );
    return subscription;
  }

  async findPaymentEvent(providerEventId: string): Promise<PaymentEvent | null> {
    const row = await this.manager.findOne(PaymentEventEntity, {
      where: { providerEventId },
    });
    return row ? toPaymentEvent(row) : null;
  }

  async insertPaymentEvent(event: PaymentEvent): Promise<PaymentEvent> {
    try {
      await this.manager.insert(PaymentEventEntity, { ...event });
    } catch (error) {
      if (isUniqueViolation(error, PAYMENT_EVENT_UNIQUE_CONSTRAINT)) {
        throw new DuplicateEventError(event.providerEventId);
      }
      throw error;
    }
    return event;
  }

  async markPaymentEventProcessed(id: string, processedAt: Date): Promise<void> {
    await this.manager.update(PaymentEventEntity, { id }, { processedAt });
  }

  async insertMembershipIntent(
    intent: MembershipIntent,
  ): Promise<MembershipIntent> {
    await this.manager.update(
      MembershipIntentEntity,
      {
        userId: intent.userId,
        status: MembershipIntentStatus.PENDING,
      },
      { status: MembershipIntentStatus.SUPERSEDED },
    );
    await this.manager.insert(MembershipIntentEntity, { ...intent });
    return intent;
  }

  private async writeSubscription(write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (error) {
      if (isUniqueViolation(error, 'uq_subscriptions_open_user')) {
        throw new SubscriptionConflictError(
          'User already has an open subscription',
        );
      }
      throw error;
    }
  }
}

export interface TypeOrmStoreOptions {
  url: string;
  lockTimeoutMs: number;
}

export class TypeOrmSubscriptionStore
  implements SubscriptionStore, OnApplicationShutdown
{
  private readonly logger = logger();

  constructor(
    private readonly dataSource: DataSource,
    private readonly lockTimeoutMs: number,
  ) {}

  /**
   * Connects and applies pending migrations; failure here aborts startup
   */
  static async connect(
    options: TypeOrmStoreOptions,
  ): Promise<TypeOrmSubscriptionStore> {
    const dataSource = new DataSource({
      type: 'postgres',
      url: options.url,
      entities: [
        SubscriptionEntity,
        PaymentEventEntity,
        MembershipIntentEntity,
        PlanEntity,
      ],
      migrations: [InitialSchema1717171717000],
      migrationsRun: true,
      synchronize: false,
    });
    await dataSource.initialize();
    return new TypeOrmSubscriptionStore(dataSource, options.lockTimeoutMs);
  }

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    try {
      return await this.dataSource.transaction('READ COMMITTED', async (manager) => {
        // SET does not take bind parameters; the value is an integer we own
        await manager.query(
          `SET LOCAL lock_timeout = '${Math.max(1, Math.floor(this.lockTimeoutMs))}ms'`,
        );
        return work(new TypeOrmStoreTransaction(manager));
      });
    } catch (error) {
      throw translateDriverError(error);
    }
  }

  async findSubscriptionById(id: string): Promise<Subscription | null> {
    const row = await this.subscriptions().findOne({ where: { id } });
    return row ? toSubscription(row) : null;
  }

  async findOpenSubscription(userId: string): Promise<Subscription | null> {
    const row = await this.subscriptions().findOne({
      where: { userId, state: In([...OPEN_SUBSCRIPTION_STATES]) },
    });
    return row ? toSubscription(row) : null;
  }

  async findLatestSubscription(userId: string): Promise<Subscription | null> {
    const row = await this.subscriptions().findOne({
      where: { userId },
      order: { createdAt: 'DESC' },
    });
    return row ? toSubscription(row) : null;
  }

  async hasEndedSubscription(userId: string): Promise<boolean> {
    const count = await this.subscriptions().count({
      where: [
        { userId, state: SubscriptionState.EXPIRED },
        {
          userId,
          state: SubscriptionState.CANCELED,
          currentPeriodEnd: Not(IsNull()),
        },
      ],
    });
    return count > 0;
  }

  async findSubscriptionByProviderRef(
    providerName: string,
    providerSubscriptionRef: string,
  ): Promise<Subscription | null> {
    const row = await this.subscriptions().findOne({
      where: { providerName, providerSubscriptionRef },
      order: { createdAt: 'DESC' },
    });
    return row ? toSubscription(row) : null;
  }

  async findSweepCandidates(
    kind: SweepCandidateKind,
    page: SweepPage,
  ): Promise<Subscription[]> {
    const query = this.subscriptions()
      .createQueryBuilder('subscription')
      .where('subscription.currentPeriodEnd <= :periodEndBefore', {
        periodEndBefore: page.periodEndBefore,
      });

    if (kind === 'grace') {
      query.andWhere('subscription.state = :state', {
        state: SubscriptionState.GRACE_PERIOD,
      });
    } else {
      query
        .andWhere('subscription.state = :state', {
          state: SubscriptionState.ACTIVE,
        })
        .andWhere('subscription.autoRenew = :autoRenew', {
          autoRenew: kind === 'renewal',
        });
    }

    if (page.after) {
      query.andWhere(
        '(subscription.currentPeriodEnd > :afterEnd OR (subscription.currentPeriodEnd = :afterEnd AND subscription.id > :afterId))',
        { afterEnd: page.after.currentPeriodEnd, afterId: page.after.id },
      );
    }

    const rows = await query
      .orderBy('subscription.currentPeriodEnd', 'ASC')
      .addOrderBy('subscription.id', 'ASC')
      .limit(page.limit)
      .getMany();
    return rows.map(toSubscription);
  }

  async findPaymentEvent(providerEventId: string): Promise<PaymentEvent | null> {
    const row = await this.dataSource
      .getRepository(PaymentEventEntity)
      .findOne({ where: { providerEventId } });
    return row ? toPaymentEvent(row) : null;
  }

  async listPaymentEvents(subscriptionId: string): Promise<PaymentEvent[]> {
    const rows = await this.dataSource.getRepository(PaymentEventEntity).find({
      where: { subscriptionId },
      order: { receivedAt: 'ASC' },
    });
    return rows.map(toPaymentEvent);
  }

  async listMembershipIntents(
    subscriptionId: string,
  ): Promise<MembershipIntent[]> {
    const rows = await this.intents().find({
      where: { subscriptionId },
      order: { createdAt: 'ASC' },
    });
    return rows.map(toIntent);
  }

  async claimDueIntents(
    now: Date,
    limit: number,
    leaseUntil: Date,
  ): Promise<MembershipIntent[]> {
    return this.dataSource.transaction(async (manager) => {
      const due = await manager
        .getRepository(MembershipIntentEntity)
        .createQueryBuilder('intent')
        .setLock('pessimistic_write')
        .setOnLocked('skip_locked')
        .where('intent.status = :status', {
          status: MembershipIntentStatus.PENDING,
        })
        .andWhere('intent.nextAttemptAt <= :now', { now })
        .orderBy('intent.createdAt', 'ASC')
        .limit(limit)
        .getMany();

      if (due.length === 0) return [];

      await manager.update(
        MembershipIntentEntity,
        { id: In(due.map((intent) => intent.id)) },
        { nextAttemptAt: leaseUntil },
      );
      return due.map((intent) => ({
        ...toIntent(intent),
        nextAttemptAt: leaseUntil,
      }));
    });
  }

  async findLatestIntent(userId: string): Promise<MembershipIntent | null> {
    const row = await this.intents().findOne({
      where: { userId },
      order: { createdAt: 'DESC' },
    });
    return row ? toIntent(row) : null;
  }

  async markIntentApplied(id: string, appliedAt: Date): Promise<void> {
    await this.dataSource
      .createQueryBuilder()
      .update(MembershipIntentEntity)
      .set({
        applied: true,
        lastAttemptAt: appliedAt,
        status: () =>
          `CASE WHEN "status" = '${MembershipIntentStatus.PENDING}' THEN '${MembershipIntentStatus.APPLIED}' ELSE "status" END`,
      })
      .where('id = :id', { id })
      .execute();
  }

  async markIntentSuperseded(id: string): Promise<void> {
    await this.intents().update(
      { id, status: MembershipIntentStatus.PENDING },
      { status: MembershipIntentStatus.SUPERSEDED },
    );
  }

  async recordIntentFailure(
    id: string,
    update: IntentFailureUpdate,
  ): Promise<void> {
    await this.intents().update(
      { id, status: MembershipIntentStatus.PENDING },
      {
        attemptCount: update.attemptCount,
        lastAttemptAt: update.attemptedAt,
        lastError: update.error,
        ...(update.nextAttemptAt
          ? { nextAttemptAt: update.nextAttemptAt }
          : { status: MembershipIntentStatus.FAILED }),
      },
    );
  }

  async listFailedIntents(limit: number): Promise<MembershipIntent[]> {
    const rows = await this.intents().find({
      where: { status: MembershipIntentStatus.FAILED },
      order: { createdAt: 'ASC' },
      take: limit,
    });
    return rows.map(toIntent);
  }

  async countFailedIntents(): Promise<number> {
    return this.intents().count({
      where: { status: MembershipIntentStatus.FAILED },
    });
  }

  async requeueFailedIntent(
    id: string,
    now: Date,
  ): Promise<MembershipIntent | null> {
    const result = await this.intents().update(
      { id, status: MembershipIntentStatus.FAILED },
      {
        status: MembershipIntentStatus.PENDING,
        attemptCount: 0,
        nextAttemptAt: now,
      },
    );
    if (!result.affected) return null;
    const row = await this.intents().findOne({ where: { id } });
    return row ? toIntent(row) : null;
  }

  async findPlan(id: string): Promise<Plan | null> {
    const row = await this.dataSource
      .getRepository(PlanEntity)
      .findOne({ where: { id } });
    return row ? toPlan(row) : null;
  }

  async savePlan(plan: Plan): Promise<Plan> {
    await this.dataSource.getRepository(PlanEntity).save({ ...plan });
    return plan;
  }

  async ping(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Database ping failed');
      return false;
    }
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  private subscriptions() {
    return this.dataSource.getRepository(SubscriptionEntity);
  }

  private intents() {
    return this.dataSource.getRepository(MembershipIntentEntity);
  }
}
