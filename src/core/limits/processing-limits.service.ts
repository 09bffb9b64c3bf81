import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface SweepLimits {
  batchSize: number;
  concurrency: number;
  lookaheadMs: number;
  gracePeriodMs: number;
}

export interface MembershipRetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** time allowed per intent; a claimed batch is leased for leaseMs × batchSize */
  leaseMs: number;
  batchSize: number;
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

@Injectable()
export class ProcessingLimitsService {
  constructor(private readonly configService: ConfigService) {}

  getProviderCallTimeout(): number {
    return this.configService.get<number>('PROVIDER_CALL_TIMEOUT_MS', 5000);
  }

  getGroupApiTimeout(): number {
    return this.configService.get<number>('GROUP_API_TIMEOUT_MS', 15000);
  }

  getLockTimeout(): number {
    return this.configService.get<number>('DB_LOCK_TIMEOUT_MS', 5000);
  }

  getTransactionMaxRetries(): number {
    return this.configService.get<number>('TRANSACTION_MAX_RETRIES', 3);
  }

  getSweepLimits(): SweepLimits {
    return {
      batchSize: this.configService.get<number>('SWEEP_BATCH_SIZE', 200),
      concurrency: this.configService.get<number>('SWEEP_CONCURRENCY', 5),
      lookaheadMs:
        this.configService.get<number>('RENEWAL_LOOKAHEAD_HOURS', 24) * HOUR_MS,
      gracePeriodMs:
        this.configService.get<number>('GRACE_PERIOD_DAYS', 2) * DAY_MS,
    };
  }

  getMembershipRetryPolicy(): MembershipRetryPolicy {
    return {
      maxAttempts: this.configService.get<number>(
        'MEMBERSHIP_SYNC_MAX_ATTEMPTS',
        8,
      ),
      backoffBaseMs: this.configService.get<number>(
        'MEMBERSHIP_SYNC_BACKOFF_BASE_MS',
        5000,
      ),
      backoffMaxMs: this.configService.get<number>(
        'MEMBERSHIP_SYNC_BACKOFF_MAX_MS',
        30 * 60 * 1000,
      ),
      leaseMs: this.getGroupApiTimeout() * 2,
      batchSize: this.configService.get<number>('MEMBERSHIP_SYNC_BATCH_SIZE', 50),
    };
  }
}
