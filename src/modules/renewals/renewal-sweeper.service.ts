import {
  Inject,
  Injectable,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { errorMessage } from '../../core/errors/subscription.errors';
import {
  ProcessingLimitsService,
  SweepLimits,
} from '../../core/limits/processing-limits.service';
import { logger } from '../../core/logger/logger.config';
import { batchProcessWithErrors, BatchSummary } from '../../core/utils/promise-batch.util';
import {
  idempotencyKey,
  PaymentGateway,
  Subscription,
  SubscriptionStore,
  SweepCandidateKind,
  SweepCursor,
} from '../../domain/subscriptions';
import { SUBSCRIPTION_STORE } from '../../store/store.tokens';
import { PAYMENT_GATEWAY } from '../providers/payment-gateway.tokens';
import { AppliedTransition, LifecycleService } from '../subscriptions/lifecycle.service';

export const RENEWAL_SWEEP_INTERVAL = 'renewal-sweep';

export type RenewalOutcome =
  | 'renewal_initiated'
  | 'renewal_not_required'
  | 'renewal_failed';

export interface SweepReport {
  startedAt: Date;
  graceExpired: number;
  periodsExpired: number;
  renewalsInitiated: number;
  renewalsNotRequired: number;
  renewalFailures: number;
  errors: number;
  skipped: number;
  aborted: boolean;
}

const emptyReport = (startedAt: Date): SweepReport => ({
  startedAt,
  graceExpired: 0,
  periodsExpired: 0,
  renewalsInitiated: 0,
  renewalsNotRequired: 0,
  renewalFailures: 0,
  errors: 0,
  skipped: 0,
  aborted: false,
});

interface SweepPhase<R> {
  kind: SweepCandidateKind;
  periodEndBefore: Date;
  process: (subscription: Subscription) => Promise<R>;
}

interface PhaseOutcome<R> {
  results: R[];
  candidates: number;
}

/**
 * Periodic pass over subscriptions nearing or past their period end
 *
 * Initiates renewal charges and expires lapsed periods and grace windows.
 * It never confirms a charge: renewals become effective only through the
 * provider's webhook. Each phase pages through its candidates with a keyset
 * cursor, so rows one phase cannot finish never hide rows of another.
 */
@Injectable()
export class RenewalSweeperService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = logger();
  private readonly abortController = new AbortController();
  private currentRun: Promise<SweepReport> | null = null;

  constructor(
    @Inject(SUBSCRIPTION_STORE) private readonly store: SubscriptionStore,
    @Inject(PAYMENT_GATEWAY) private readonly gateway: PaymentGateway,
    private readonly lifecycleService: LifecycleService,
    private readonly limitsService: ProcessingLimitsService,
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onModuleInit() {
    const intervalMs = this.configService.get<number>(
      'RENEWAL_SWEEP_INTERVAL_MS',
      300000,
    );
    const handle = setInterval(() => {
      this.runSweep().catch((error: unknown) => {
        this.logger.error({ error: errorMessage(error) }, 'Renewal sweep failed');
      });
    }, intervalMs);
    this.schedulerRegistry.addInterval(RENEWAL_SWEEP_INTERVAL, handle);
    this.logger.info({ intervalMs }, 'Renewal sweep scheduled');
  }

  async onApplicationShutdown() {
    if (this.schedulerRegistry.doesExist('interval', RENEWAL_SWEEP_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(RENEWAL_SWEEP_INTERVAL);
    }
    this.abortController.abort();
    if (this.currentRun) {
      await this.currentRun;
    }
  }

  isRunning(): boolean {
    return this.currentRun !== null;
  }

  /**
   * Starts a sweep; while one is running, further calls return it instead
   * of starting another
   */
  runSweep(now: Date = new Date()): Promise<SweepReport> {
    if (this.currentRun) {
      this.logger.warn('Previous renewal sweep still running, skipping tick');
      return this.currentRun;
    }
    this.currentRun = this.sweep(now).finally(() => {
      this.currentRun = null;
    });
    return this.currentRun;
  }

  private async sweep(now: Date): Promise<SweepReport> {
    const limits = this.limitsService.getSweepLimits();
    const report = emptyReport(now);

    const grace = await this.runPhase(report, limits, {
      kind: 'grace',
      periodEndBefore: new Date(now.getTime() - limits.gracePeriodMs),
      process: (subscription) =>
        this.lifecycleService.expireGraceWindow(subscription.id, now),
    });
    report.graceExpired = this.countChanged(grace.results);

    const lapsed = await this.runPhase(report, limits, {
      kind: 'lapsed',
      periodEndBefore: now,
      process: (subscription) =>
        this.lifecycleService.expireLapsedPeriod(subscription.id, now),
    });
    report.periodsExpired = this.countChanged(lapsed.results);

    let renewalCandidates = 0;
    if (this.gateway.getCapabilities().managesRenewals) {
      this.logger.debug(
        { provider: this.gateway.providerName },
        'Provider bills renewals itself; no renewal charges requested',
      );
    } else {
      const renewals = await this.runPhase(report, limits, {
        kind: 'renewal',
        periodEndBefore: new Date(now.getTime() + limits.lookaheadMs),
        process: (subscription) => this.requestRenewal(subscription, now),
      });
      renewalCandidates = renewals.candidates;
      for (const outcome of renewals.results) {
        this.tally(report, outcome);
      }
    }

    report.aborted = this.abortController.signal.aborted;
    this.logger.info(
      {
        ...report,
        graceCandidates: grace.candidates,
        lapsedCandidates: lapsed.candidates,
        renewalCandidates,
      },
      'Renewal sweep completed',
    );
    return report;
  }

  /**
   * Works through every candidate of one kind, a page at a time, until a
   * short page or an abort
   */
  private async runPhase<R>(
    report: SweepReport,
    limits: SweepLimits,
    phase: SweepPhase<R>,
  ): Promise<PhaseOutcome<R>> {
    const signal = this.abortController.signal;
    const outcome: PhaseOutcome<R> = { results: [], candidates: 0 };
    let after: SweepCursor | undefined;

    while (!signal.aborted) {
      const page = await this.store.findSweepCandidates(phase.kind, {
        periodEndBefore: phase.periodEndBefore,
        limit: limits.batchSize,
        after,
      });
      outcome.candidates += page.length;

      const summary = await batchProcessWithErrors(page, phase.process, {
        concurrencyLimit: limits.concurrency,
        signal,
      });
      outcome.results.push(...summary.successful);
      this.collectFailures(report, summary, phase.kind);

      const last = page[page.length - 1];
      if (!last || page.length < limits.batchSize) break;
      after = {
        currentPeriodEnd: last.currentPeriodEnd ?? phase.periodEndBefore,
        id: last.id,
      };
    }
    return outcome;
  }

  private countChanged(results: Array<AppliedTransition | null>): number {
    return results.filter((applied) => applied?.changed).length;
  }

  private async requestRenewal(
    subscription: Subscription,
    now: Date,
  ): Promise<RenewalOutcome> {
    // candidates come from a query, so a period end is always present
    const periodEnd = subscription.currentPeriodEnd ?? now;
    const result = await this.gateway.createRecurringCharge({
      subscriptionId: subscription.id,
      userId: subscription.userId,
      providerSubscriptionRef: subscription.providerSubscriptionRef,
      amountMinor: subscription.amountMinor,
      currency: subscription.currency,
      idempotencyKey: idempotencyKey(subscription.id, 'renewal', periodEnd),
    });

    if (!result.ok) {
      this.logger.warn(
        {
          subscriptionId: subscription.id,
          kind: result.error.kind,
          retryable: result.error.retryable,
          error: result.error.message,
        },
        'Renewal charge could not be initiated; the next sweep retries it',
      );
      return 'renewal_failed';
    }

    this.logger.info(
      {
        subscriptionId: subscription.id,
        chargeId: result.value.chargeId,
        status: result.value.status,
        currentPeriodEnd: periodEnd,
      },
      'Renewal charge requested',
    );
    return result.value.status === 'initiated'
      ? 'renewal_initiated'
      : 'renewal_not_required';
  }

  private tally(report: SweepReport, outcome: RenewalOutcome): void {
    switch (outcome) {
      case 'renewal_initiated':
        report.renewalsInitiated += 1;
        break;
      case 'renewal_not_required':
        report.renewalsNotRequired += 1;
        break;
      case 'renewal_failed':
        report.renewalFailures += 1;
        break;
    }
  }

  private collectFailures<R>(
    report: SweepReport,
    summary: BatchSummary<Subscription, R>,
    phase: string,
  ): void {
    report.errors += summary.failed.length;
    report.skipped += summary.skipped;
    for (const failure of summary.failed) {
      this.logger.error(
        { phase, subscriptionId: failure.item.id, error: failure.error.message },
        'Sweep candidate failed',
      );
    }
  }
}
