import {
  Inject,
  Injectable,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  CircuitBreakerService,
  isTimeoutError,
} from '../../core/circuit-breaker/circuit-breaker.service';
import {
  errorMessage,
  MembershipSyncFailedError,
} from '../../core/errors/subscription.errors';
import {
  MembershipRetryPolicy,
  ProcessingLimitsService,
} from '../../core/limits/processing-limits.service';
import { logger } from '../../core/logger/logger.config';
import { backoffDelayMs } from '../../core/utils/delay.util';
import {
  GroupCallResult,
  GroupManager,
  MembershipDesiredState,
  MembershipIntent,
  SubscriptionStore,
} from '../../domain/subscriptions';
import { SUBSCRIPTION_STORE } from '../../store/store.tokens';
import { GROUP_MANAGER } from './membership.tokens';

export const MEMBERSHIP_SYNC_INTERVAL = 'membership-sync';

const GROUP_API_BREAKER = 'group-api';

export type IntentOutcome = 'applied' | 'retried' | 'failed' | 'superseded';

export interface MembershipSyncReport {
  claimed: number;
  applied: number;
  retried: number;
  failed: number;
  superseded: number;
}

/**
 * Applies recorded membership intents to the chat group, after commit and
 * outside any subscription lock
 *
 * Runs on a fixed interval and, when enabled, right after a transition that
 * wrote an intent. Delivery is at-least-once; a claimed intent is leased so
 * concurrent workers skip it.
 */
@Injectable()
export class MembershipSyncService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = logger();
  private currentRun: Promise<MembershipSyncReport> | null = null;
  private rerunRequested = false;
  private stopping = false;

  constructor(
    @Inject(SUBSCRIPTION_STORE) private readonly store: SubscriptionStore,
    @Inject(GROUP_MANAGER) private readonly groupManager: GroupManager,
    private readonly circuitBreakers: CircuitBreakerService,
    private readonly limitsService: ProcessingLimitsService,
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onModuleInit() {
    const intervalMs = this.configService.get<number>(
      'MEMBERSHIP_SYNC_INTERVAL_MS',
      30000,
    );
    const handle = setInterval(() => this.trigger('interval'), intervalMs);
    this.schedulerRegistry.addInterval(MEMBERSHIP_SYNC_INTERVAL, handle);
    this.logger.info(
      { intervalMs, groupManager: this.groupManager.name },
      'Membership sync scheduled',
    );
  }

  async onApplicationShutdown() {
    this.stopping = true;
    if (this.schedulerRegistry.doesExist('interval', MEMBERSHIP_SYNC_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(MEMBERSHIP_SYNC_INTERVAL);
    }
    if (this.currentRun) {
      await this.currentRun;
    }
  }

  /**
   * Push path, called after a commit that wrote intents
   */
  notifyIntentsWritten(): void {
    if (this.configService.get<boolean>('MEMBERSHIP_SYNC_ON_COMMIT', true)) {
      this.trigger('commit');
    }
  }

  /**
   * Processes every due intent once. A call made while a run is in progress
   * joins it and schedules one follow-up run.
   */
  runOnce(now: Date = new Date()): Promise<MembershipSyncReport> {
    if (this.currentRun) {
      this.rerunRequested = true;
      return this.currentRun;
    }

    this.currentRun = this.processDueIntents(now).finally(() => {
      this.currentRun = null;
      if (this.rerunRequested) {
        this.rerunRequested = false;
        this.trigger('rerun');
      }
    });
    return this.currentRun;
  }

  private trigger(source: string): void {
    if (this.stopping) return;
    this.runOnce().catch((error: unknown) => {
      this.logger.error(
        { source, error: errorMessage(error) },
        'Membership sync run failed',
      );
    });
  }

  private async processDueIntents(now: Date): Promise<MembershipSyncReport> {
    const policy = this.limitsService.getMembershipRetryPolicy();
    // intents run one after another, so the lease covers the whole batch
    const intents = await this.store.claimDueIntents(
      now,
      policy.batchSize,
      new Date(now.getTime() + policy.leaseMs * policy.batchSize),
    );

    const report: MembershipSyncReport = {
      claimed: intents.length,
      applied: 0,
      retried: 0,
      failed: 0,
      superseded: 0,
    };

    for (const intent of intents) {
      const outcome = await this.applyIntent(intent, policy, now);
      report[outcome] += 1;
    }

    if (intents.length > 0) {
      this.logger.info(report, 'Membership sync run completed');
    }
    return report;
  }

  private async applyIntent(
    intent: MembershipIntent,
    policy: MembershipRetryPolicy,
    now: Date,
  ): Promise<IntentOutcome> {
    const latest = await this.store.findLatestIntent(intent.userId);
    if (latest && latest.id !== intent.id) {
      await this.store.markIntentSuperseded(intent.id);
      this.logger.info(
        {
          intentId: intent.id,
          subscriptionId: intent.subscriptionId,
          userId: intent.userId,
          desiredState: intent.desiredState,
          latestIntentId: latest.id,
        },
        'Membership intent skipped; a newer intent exists for the user',
      );
      return 'superseded';
    }

    const result = await this.callGroupApi(intent);

    if (result.ok) {
      await this.store.markIntentApplied(intent.id, now);
      this.logger.info(
        {
          intentId: intent.id,
          subscriptionId: intent.subscriptionId,
          userId: intent.userId,
          desiredState: intent.desiredState,
        },
        'Membership intent applied',
      );
      return 'applied';
    }

    const attemptCount = intent.attemptCount + 1;
    const context = {
      intentId: intent.id,
      subscriptionId: intent.subscriptionId,
      userId: intent.userId,
      desiredState: intent.desiredState,
      attemptCount,
      error: result.message,
    };

    if (!result.transient || attemptCount >= policy.maxAttempts) {
      await this.store.recordIntentFailure(intent.id, {
        attemptCount,
        attemptedAt: now,
        error: result.message,
        nextAttemptAt: null,
      });
      this.logger.error(
        { ...context, alert: 'membership_sync_failed', permanent: !result.transient },
        'Membership change could not be applied; manual action required',
      );
      return 'failed';
    }

    const delayMs = Math.max(
      backoffDelayMs(intent.attemptCount, policy.backoffBaseMs, policy.backoffMaxMs),
      result.retryAfterMs ?? 0,
    );
    await this.store.recordIntentFailure(intent.id, {
      attemptCount,
      attemptedAt: now,
      error: result.message,
      nextAttemptAt: new Date(now.getTime() + delayMs),
    });
    this.logger.warn({ ...context, delayMs }, 'Membership intent will be retried');
    return 'retried';
  }

  private async callGroupApi(intent: MembershipIntent): Promise<GroupCallResult> {
    const call = () =>
      intent.desiredState === MembershipDesiredState.MEMBER
        ? this.groupManager.addMember(intent.userId)
        : this.groupManager.removeMember(intent.userId);

    try {
      return await this.circuitBreakers.execute(
        GROUP_API_BREAKER,
        async () => {
          const result = await call();
          // transient failures are thrown so they count towards opening the breaker
          if (!result.ok && result.transient) {
            throw new MembershipSyncFailedError(
              result.message,
              true,
              result.retryAfterMs,
            );
          }
          return result;
        },
        { timeout: this.limitsService.getGroupApiTimeout() },
      );
    } catch (error) {
      if (error instanceof MembershipSyncFailedError) {
        return {
          ok: false,
          transient: error.transient,
          message: error.message,
          retryAfterMs: error.retryAfterMs,
        };
      }
      return {
        ok: false,
        transient: true,
        message: isTimeoutError(error)
          ? 'Group API call timed out'
          : errorMessage(error),
      };
    }
  }
}
