import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GroupManagerName } from '../../config/env.validation';
import { GroupManager } from '../../domain/subscriptions';
import { LoggingGroupManager } from './adapters/logging-group-manager.service';
import { TelegramGroupManager } from './adapters/telegram-group-manager.service';
import { MembershipSyncService } from './membership-sync.service';
import { GROUP_MANAGER } from './membership.tokens';

@Module({
  providers: [
    LoggingGroupManager,
    TelegramGroupManager,
    {
      provide: GROUP_MANAGER,
      inject: [ConfigService, LoggingGroupManager, TelegramGroupManager],
      useFactory: (
        config: ConfigService,
        loggingManager: LoggingGroupManager,
        telegramManager: TelegramGroupManager,
      ): GroupManager => {
        const configured = config.get<GroupManagerName>('GROUP_MANAGER', 'logging');
        if (configured === 'telegram') {
          telegramManager.assertConfigured();
          return telegramManager;
        }
        return loggingManager;
      },
    },
    MembershipSyncService,
  ],
  exports: [MembershipSyncService],
})
export class MembershipModule {}
