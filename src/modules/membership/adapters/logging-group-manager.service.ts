import { Injectable } from '@nestjs/common';
import { logger } from '../../../core/logger/logger.config';
import { GroupCallResult, GroupManager } from '../../../domain/subscriptions';

/**
 * Records membership changes in the log only; for deployments without a
 * chat group and for local runs
 */
@Injectable()
export class LoggingGroupManager implements GroupManager {
  private readonly logger = logger();
  readonly name = 'logging';

  async addMember(userId: string): Promise<GroupCallResult> {
    this.logger.info({ userId }, 'Group membership granted');
    return { ok: true };
  }

  async removeMember(userId: string): Promise<GroupCallResult> {
    this.logger.info({ userId }, 'Group membership revoked');
    return { ok: true };
  }
}
