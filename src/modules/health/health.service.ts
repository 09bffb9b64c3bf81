import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { logger } from '../../core/logger/logger.config';
import { PaymentGateway, SubscriptionStore } from '../../domain/subscriptions';
import { SUBSCRIPTION_STORE } from '../../store/store.tokens';
import { PAYMENT_GATEWAY } from '../providers/payment-gateway.tokens';

@Injectable()
export class HealthService extends HealthIndicator {
  private readonly logger = logger();

  constructor(
    private readonly configService: ConfigService,
    private readonly circuitBreakerService: CircuitBreakerService,
    @Inject(SUBSCRIPTION_STORE) private readonly store: SubscriptionStore,
    @Inject(PAYMENT_GATEWAY) private readonly gateway: PaymentGateway,
  ) {
    super();
  }

  async checkStore(): Promise<HealthIndicatorResult> {
    const isHealthy = await this.store.ping();
    return this.result('store', isHealthy, {
      driver: this.configService.get<string>('STORE_DRIVER', 'postgres'),
      message: isHealthy ? 'Store reachable' : 'Store unreachable',
    });
  }

  async checkPaymentGateway(): Promise<HealthIndicatorResult> {
    const isHealthy = await this.gateway.isHealthy();
    return this.result('payment-gateway', isHealthy, {
      provider: this.gateway.providerName,
      circuitBreaker:
        this.circuitBreakerService.getCircuitBreakerState(
          `${this.gateway.providerName}-api`,
        ) ?? { state: 'unused' },
    });
  }

  async checkCircuitBreakers(): Promise<HealthIndicatorResult> {
    const allBreakers = this.circuitBreakerService.getAllCircuitBreakersState();
    const openBreakers = Object.entries(allBreakers).filter(
      ([, state]) => state.state === 'open',
    );

    const isHealthy = openBreakers.length === 0;

    return this.result('circuit-breakers', isHealthy, {
      total: Object.keys(allBreakers).length,
      open: openBreakers.length,
      breakers: allBreakers,
      message: isHealthy
        ? 'All circuit breakers closed'
        : `${openBreakers.length} circuit breaker(s) open`,
    });
  }

  /**
   * Failed intents are memberships that disagree with payment state until
   * an operator retries them
   */
  async checkMembershipIntents(): Promise<HealthIndicatorResult> {
    const failed = await this.store.countFailedIntents();
    const threshold = this.configService.get<number>(
      'FAILED_INTENT_HEALTH_THRESHOLD',
      25,
    );
    const isHealthy = failed < threshold;

    return this.result('membership-intents', isHealthy, {
      failed,
      threshold,
      message: isHealthy
        ? 'Failed membership intents below threshold'
        : 'Too many failed membership intents',
    });
  }

  private result(
    key: string,
    isHealthy: boolean,
    data: Record<string, unknown>,
  ): HealthIndicatorResult {
    const status = this.getStatus(key, isHealthy, data);
    if (isHealthy) return status;

    this.logger.warn({ check: key, ...data }, 'Health check failed');
    throw new HealthCheckError(`${key} check failed`, status);
  }
}
