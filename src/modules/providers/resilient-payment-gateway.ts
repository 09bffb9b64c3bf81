import {
  CircuitBreakerService,
  isBreakerRejection,
  isTimeoutError,
} from '../../core/circuit-breaker/circuit-breaker.service';
import {
  errorMessage,
  ProviderUnavailableError,
} from '../../core/errors/subscription.errors';
import { logger } from '../../core/logger/logger.config';
import {
  CancelRecurringRequest,
  ChargeReceipt,
  CreatePaymentRequest,
  GatewayCapabilities,
  gatewayFailure,
  GatewayResult,
  ParsedWebhook,
  PaymentGateway,
  PaymentSession,
  RecurringChargeRequest,
} from '../../domain/subscriptions';

/**
 * Wraps the configured gateway's outbound calls in a per-provider circuit
 * breaker with a hard timeout. Whatever happens, callers get a tagged result.
 */
export class ResilientPaymentGateway implements PaymentGateway {
  private readonly logger = logger();
  readonly providerName: string;
  readonly signatureHeader: string;

  constructor(
    private readonly inner: PaymentGateway,
    private readonly circuitBreakers: CircuitBreakerService,
    private readonly timeoutMs: number,
  ) {
    this.providerName = inner.providerName;
    this.signatureHeader = inner.signatureHeader;
  }

  get breakerName(): string {
    return `${this.providerName}-api`;
  }

  createPayment(
    request: CreatePaymentRequest,
  ): Promise<GatewayResult<PaymentSession>> {
    return this.guarded('createPayment', () => this.inner.createPayment(request));
  }

  createRecurringCharge(
    request: RecurringChargeRequest,
  ): Promise<GatewayResult<ChargeReceipt>> {
    return this.guarded('createRecurringCharge', () =>
      this.inner.createRecurringCharge(request),
    );
  }

  cancelRecurringCharge(
    request: CancelRecurringRequest,
  ): Promise<GatewayResult<void>> {
    return this.guarded('cancelRecurringCharge', () =>
      this.inner.cancelRecurringCharge(request),
    );
  }

  verifyWebhookSignature(rawBody: Buffer, signature: string): boolean {
    return this.inner.verifyWebhookSignature(rawBody, signature);
  }

  parseWebhookEvent(rawBody: Buffer): ParsedWebhook {
    return this.inner.parseWebhookEvent(rawBody);
  }

  getCapabilities(): GatewayCapabilities {
    return this.inner.getCapabilities();
  }

  async isHealthy(): Promise<boolean> {
    return (
      !this.circuitBreakers.isOpen(this.breakerName) &&
      (await this.inner.isHealthy())
    );
  }

  private async guarded<T>(
    operation: string,
    call: () => Promise<GatewayResult<T>>,
  ): Promise<GatewayResult<T>> {
    try {
      return await this.circuitBreakers.execute(
        this.breakerName,
        async () => {
          const result = await call();
          // thrown so the breaker counts it
          if (!result.ok && result.error.retryable) {
            throw new ProviderUnavailableError(result.error);
          }
          return result;
        },
        { timeout: this.timeoutMs },
      );
    } catch (error) {
      if (error instanceof ProviderUnavailableError) {
        return { ok: false, error: error.failure };
      }
      if (isTimeoutError(error)) {
        this.logger.warn(
          { provider: this.providerName, operation, timeoutMs: this.timeoutMs },
          'Payment provider call timed out',
        );
        return gatewayFailure('timeout', `${operation} timed out`);
      }
      if (isBreakerRejection(error)) {
        return gatewayFailure(
          'network',
          `${this.providerName} circuit breaker is open`,
        );
      }
      this.logger.error(
        { provider: this.providerName, operation, error: errorMessage(error) },
        'Payment provider call threw',
      );
      return gatewayFailure('network', errorMessage(error));
    }
  }
}
