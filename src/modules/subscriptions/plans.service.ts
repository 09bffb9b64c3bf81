import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PlanNotFoundError } from '../../core/errors/subscription.errors';
import { logger } from '../../core/logger/logger.config';
import {
  DEFAULT_PLAN_ID,
  Plan,
  SubscriptionStore,
} from '../../domain/subscriptions';
import { SUBSCRIPTION_STORE } from '../../store/store.tokens';

export interface PlanPriceUpdate {
  amountMinor: number;
  returningAmountMinor?: number | null;
  currency?: string;
}

@Injectable()
export class PlansService implements OnModuleInit {
  private readonly logger = logger();

  constructor(
    @Inject(SUBSCRIPTION_STORE) private readonly store: SubscriptionStore,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit() {
    await this.ensureDefaultPlan();
  }

  /**
   * Seeds the default plan from configuration the first time the service
   * starts against an empty store
   */
  async ensureDefaultPlan(): Promise<Plan> {
    const existing = await this.store.findPlan(DEFAULT_PLAN_ID);
    if (existing) return existing;

    const plan = await this.store.savePlan({
      id: DEFAULT_PLAN_ID,
      name: 'Community access',
      amountMinor: this.configService.get<number>('DEFAULT_PLAN_AMOUNT_MINOR', 999),
      returningAmountMinor: null,
      currency: this.configService.get<string>('DEFAULT_PLAN_CURRENCY', 'USD'),
      billingPeriodDays: this.configService.get<number>(
        'DEFAULT_PLAN_PERIOD_DAYS',
        30,
      ),
      updatedAt: new Date(),
    });
    this.logger.info({ plan }, 'Default plan created');
    return plan;
  }

  async getPlan(planId: string = DEFAULT_PLAN_ID): Promise<Plan> {
    const plan = await this.store.findPlan(planId);
    if (!plan) {
      throw new PlanNotFoundError(planId);
    }
    return plan;
  }

  /**
   * Price a new subscription for this user; users whose earlier subscription
   * has ended get the returning price when the plan has one
   */
  async quotePrice(plan: Plan, userId: string): Promise<number> {
    if (
      plan.returningAmountMinor !== null &&
      (await this.store.hasEndedSubscription(userId))
    ) {
      return plan.returningAmountMinor;
    }
    return plan.amountMinor;
  }

  /**
   * Changes the price of later subscriptions; existing ones keep the
   * snapshot they were created with
   */
  async updatePrice(planId: string, update: PlanPriceUpdate): Promise<Plan> {
    const plan = await this.getPlan(planId);
    const saved = await this.store.savePlan({
      ...plan,
      amountMinor: update.amountMinor,
      returningAmountMinor:
        update.returningAmountMinor === undefined
          ? plan.returningAmountMinor
          : update.returningAmountMinor,
      currency: update.currency ? update.currency.toUpperCase() : plan.currency,
      updatedAt: new Date(),
    });

    this.logger.info(
      {
        planId,
        previousAmountMinor: plan.amountMinor,
        amountMinor: saved.amountMinor,
        returningAmountMinor: saved.returningAmountMinor,
        currency: saved.currency,
      },
      'Plan price updated',
    );
    return saved;
  }
}
