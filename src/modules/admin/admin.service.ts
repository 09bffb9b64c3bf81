import { Inject, Injectable } from '@nestjs/common';
import { logger } from '../../core/logger/logger.config';
import { MembershipIntent, SubscriptionStore } from '../../domain/subscriptions';
import { SUBSCRIPTION_STORE } from '../../store/store.tokens';

@Injectable()
export class AdminService {
  private readonly logger = logger();

  constructor(
    @Inject(SUBSCRIPTION_STORE) private readonly store: SubscriptionStore,
  ) {}

  async listFailedIntents(
    limit: number,
  ): Promise<{ total: number; intents: MembershipIntent[] }> {
    const [total, intents] = await Promise.all([
      this.store.countFailedIntents(),
      this.store.listFailedIntents(limit),
    ]);
    return { total, intents };
  }

  async requeueFailedIntent(id: string): Promise<MembershipIntent | null> {
    const intent = await this.store.requeueFailedIntent(id, new Date());
    if (intent) {
      this.logger.info(
        { intentId: id, subscriptionId: intent.subscriptionId, userId: intent.userId },
        'Failed membership intent re-queued',
      );
    }
    return intent;
  }
}
