import { plainToInstance } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Length,
  Min,
  validateSync,
} from 'class-validator';

export const STORE_DRIVERS = ['postgres', 'memory'] as const;
export type StoreDriver = (typeof STORE_DRIVERS)[number];

export const PAYMENT_PROVIDERS = ['simulation', 'stripe'] as const;
export type PaymentProviderName = (typeof PAYMENT_PROVIDERS)[number];

export const GROUP_MANAGERS = ['telegram', 'logging'] as const;
export type GroupManagerName = (typeof GROUP_MANAGERS)[number];

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  PORT: number = 3001;

  @IsOptional()
  @IsIn(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  LOG_LEVEL: string = 'info';

  @IsOptional()
  @IsUrl({ require_tld: false })
  ALERT_WEBHOOK_URL?: string;

  @IsIn(STORE_DRIVERS)
  STORE_DRIVER: StoreDriver = 'postgres';

  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsInt()
  @Min(100)
  DB_LOCK_TIMEOUT_MS: number = 5000;

  @IsInt()
  @Min(0)
  TRANSACTION_MAX_RETRIES: number = 3;

  @IsIn(PAYMENT_PROVIDERS)
  PAYMENT_PROVIDER: PaymentProviderName = 'simulation';

  @IsOptional()
  @IsString()
  SIMULATION_WEBHOOK_SECRET?: string;

  @IsOptional()
  @IsString()
  STRIPE_SECRET_KEY?: string;

  @IsOptional()
  @IsString()
  STRIPE_WEBHOOK_SECRET?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  CHECKOUT_SUCCESS_URL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  CHECKOUT_CANCEL_URL?: string;

  @IsInt()
  @Min(100)
  PROVIDER_CALL_TIMEOUT_MS: number = 5000;

  @IsIn(GROUP_MANAGERS)
  GROUP_MANAGER: GroupManagerName = 'logging';

  @IsOptional()
  @IsString()
  TELEGRAM_BOT_TOKEN?: string;

  @IsOptional()
  @IsString()
  TELEGRAM_GROUP_ID?: string;

  @IsInt()
  @Min(100)
  GROUP_API_TIMEOUT_MS: number = 15000;

  @IsInt()
  @Min(1000)
  MEMBERSHIP_SYNC_INTERVAL_MS: number = 30000;

  @IsInt()
  @Min(1)
  MEMBERSHIP_SYNC_MAX_ATTEMPTS: number = 8;

  @IsInt()
  @Min(0)
  MEMBERSHIP_SYNC_BACKOFF_BASE_MS: number = 5000;

  @IsInt()
  @Min(0)
  MEMBERSHIP_SYNC_BACKOFF_MAX_MS: number = 1800000;

  @IsInt()
  @Min(1)
  MEMBERSHIP_SYNC_BATCH_SIZE: number = 50;

  @IsBoolean()
  MEMBERSHIP_SYNC_ON_COMMIT: boolean = true;

  @IsInt()
  @Min(1)
  FAILED_INTENT_HEALTH_THRESHOLD: number = 25;

  @IsInt()
  @Min(1000)
  RENEWAL_SWEEP_INTERVAL_MS: number = 300000;

  @IsInt()
  @Min(0)
  RENEWAL_LOOKAHEAD_HOURS: number = 24;

  @IsInt()
  @Min(0)
  GRACE_PERIOD_DAYS: number = 2;

  @IsInt()
  @Min(1)
  SWEEP_BATCH_SIZE: number = 200;

  @IsInt()
  @Min(1)
  SWEEP_CONCURRENCY: number = 5;

  @IsInt()
  @Min(1)
  DEFAULT_PLAN_AMOUNT_MINOR: number = 999;

  @IsString()
  @Length(3, 3)
  DEFAULT_PLAN_CURRENCY: string = 'USD';

  @IsInt()
  @Min(1)
  DEFAULT_PLAN_PERIOD_DAYS: number = 30;

  @IsOptional()
  @IsString()
  ADMIN_API_TOKEN?: string;
}

/**
 * ConfigModule `validate` hook: coerces env strings and fails fast at startup
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const normalized: Record<string, unknown> = { ...config };
  for (const [key, value] of Object.entries(normalized)) {
    if (value === 'true' || value === 'false') {
      normalized[key] = value === 'true';
    }
  }

  const validated = plainToInstance(EnvironmentVariables, normalized, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
