import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StoreDriver } from '../config/env.validation';
import { ProcessingLimitsService } from '../core/limits/processing-limits.service';
import { logger } from '../core/logger/logger.config';
import { SubscriptionStore } from '../domain/subscriptions';
import { MemorySubscriptionStore } from './memory/memory-subscription.store';
import { SUBSCRIPTION_STORE } from './store.tokens';
import { TypeOrmSubscriptionStore } from './typeorm/typeorm-subscription.store';

@Global()
@Module({
  providers: [
    {
      provide: SUBSCRIPTION_STORE,
      inject: [ConfigService, ProcessingLimitsService],
      useFactory: async (
        config: ConfigService,
        limits: ProcessingLimitsService,
      ): Promise<SubscriptionStore> => {
        const driver = config.get<StoreDriver>('STORE_DRIVER', 'postgres');
        const lockTimeoutMs = limits.getLockTimeout();

        if (driver === 'memory') {
          logger().warn(
            'Using in-memory subscription store; state is lost on restart',
          );
          return new MemorySubscriptionStore({ lockTimeoutMs });
        }

        const url = config.get<string>('DATABASE_URL');
        if (!url) {
          throw new Error('DATABASE_URL is required when STORE_DRIVER=postgres');
        }
        return TypeOrmSubscriptionStore.connect({ url, lockTimeoutMs });
      },
    },
  ],
  exports: [SUBSCRIPTION_STORE],
})
export class StoreModule {}
