import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Stripe from 'stripe';
import { errorMessage } from '../../../core/errors/subscription.errors';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { logger } from '../../../core/logger/logger.config';
import { ProviderMetadata } from '../../../core/providers/provider-metadata.decorator';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import {
  CancelRecurringRequest,
  ChargeReceipt,
  CreatePaymentRequest,
  GatewayCapabilities,
  gatewayFailure,
  gatewayOk,
  GatewayResult,
  ParsedWebhook,
  PaymentGateway,
  PaymentSession,
  RecurringChargeRequest,
} from '../../../domain/subscriptions';
import { mapStripeEvent } from './stripe-event.mapper';

type RecurringInterval = { interval: 'day' | 'month' | 'year'; interval_count: number };

const recurringIntervalFor = (billingPeriodDays: number): RecurringInterval => {
  if (billingPeriodDays === 30) return { interval: 'month', interval_count: 1 };
  if (billingPeriodDays === 365) return { interval: 'year', interval_count: 1 };
  return { interval: 'day', interval_count: billingPeriodDays };
};

@Injectable()
@ProviderMetadata({
  name: 'stripe',
  displayName: 'Stripe',
  description: 'Stripe Checkout and Billing subscriptions',
})
export class StripeGateway implements PaymentGateway {
  private readonly logger = logger();
  readonly providerName = 'stripe';
  readonly signatureHeader = 'stripe-signature';

  private readonly secretKey: string;
  private readonly webhookSecret: string;
  private readonly successUrl: string;
  private readonly cancelUrl: string;
  private stripe?: Stripe;

  constructor(
    private readonly configService: ConfigService,
    private readonly limitsService: ProcessingLimitsService,
    private readonly payloadValidator: PayloadValidatorService,
  ) {
    this.secretKey = this.configService.get<string>('STRIPE_SECRET_KEY') || '';
    this.webhookSecret =
      this.configService.get<string>('STRIPE_WEBHOOK_SECRET') || '';
    this.successUrl =
      this.configService.get<string>('CHECKOUT_SUCCESS_URL') ||
      'https://example.com/subscription/success';
    this.cancelUrl =
      this.configService.get<string>('CHECKOUT_CANCEL_URL') ||
      'https://example.com/subscription/cancel';
  }

  assertConfigured(): void {
    const missing = [
      ['STRIPE_SECRET_KEY', this.secretKey],
      ['STRIPE_WEBHOOK_SECRET', this.webhookSecret],
    ]
      .filter(([, value]) => !value)
      .map(([key]) => key);

    if (missing.length > 0) {
      throw new Error(`Stripe gateway is missing ${missing.join(', ')}`);
    }
  }

  async createPayment(
    request: CreatePaymentRequest,
  ): Promise<GatewayResult<PaymentSession>> {
    const metadata = {
      subscription_id: request.subscriptionId,
      user_id: request.userId,
    };

    try {
      const session = await this.client().checkout.sessions.create(
        {
          mode: 'subscription',
          client_reference_id: request.subscriptionId,
          line_items: [
            {
              quantity: 1,
              price_data: {
                currency: request.currency.toLowerCase(),
                unit_amount: request.amountMinor,
                product_data: { name: request.description },
                recurring: recurringIntervalFor(request.billingPeriodDays),
              },
            },
          ],
          metadata,
          subscription_data: { metadata },
          success_url: this.successUrl,
          cancel_url: this.cancelUrl,
        },
        { idempotencyKey: request.idempotencyKey },
      );

      return gatewayOk({
        paymentId: session.id,
        paymentUrl: session.url,
        providerSubscriptionRef: null,
      });
    } catch (error) {
      return this.toFailure(error, 'createPayment', request.subscriptionId);
    }
  }

  /**
   * Stripe Billing charges renewals and retries failed invoices itself, so
   * there is nothing to request here
   */
  async createRecurringCharge(
    request: RecurringChargeRequest,
  ): Promise<GatewayResult<ChargeReceipt>> {
    this.logger.warn(
      { subscriptionId: request.subscriptionId },
      'Renewal charge requested from Stripe, which bills renewals itself',
    );
    return gatewayFailure(
      'business_rule',
      'Stripe bills renewals itself; no charge was requested',
    );
  }

  async cancelRecurringCharge(
    request: CancelRecurringRequest,
  ): Promise<GatewayResult<void>> {
    const options = { idempotencyKey: request.idempotencyKey };
    try {
      if (request.atPeriodEnd) {
        await this.client().subscriptions.update(
          request.providerSubscriptionRef,
          { cancel_at_period_end: true },
          options,
        );
      } else {
        await this.client().subscriptions.cancel(
          request.providerSubscriptionRef,
          {},
          options,
        );
      }
      return gatewayOk(undefined);
    } catch (error) {
      return this.toFailure(error, 'cancelRecurringCharge', request.subscriptionId);
    }
  }

  verifyWebhookSignature(rawBody: Buffer, signature: string): boolean {
    try {
      this.client().webhooks.constructEvent(rawBody, signature, this.webhookSecret);
      return true;
    } catch (error) {
      this.logger.warn(
        { error: errorMessage(error) },
        'Stripe webhook signature verification failed',
      );
      return false;
    }
  }

  parseWebhookEvent(rawBody: Buffer): ParsedWebhook {
    return mapStripeEvent(this.payloadValidator.parseJsonObject(rawBody));
  }

  getCapabilities(): GatewayCapabilities {
    return { managesRenewals: true };
  }

  async isHealthy(): Promise<boolean> {
    return this.secretKey.length > 0 && this.webhookSecret.length > 0;
  }

  private client(): Stripe {
    if (!this.stripe) {
      if (!this.secretKey) {
        throw new Error('STRIPE_SECRET_KEY is not configured');
      }
      this.stripe = new Stripe(this.secretKey, {
        timeout: this.limitsService.getProviderCallTimeout(),
        maxNetworkRetries: 1,
      });
    }
    return this.stripe;
  }

  private toFailure<T>(
    error: unknown,
    operation: string,
    subscriptionId: string,
  ): GatewayResult<T> {
    const message = errorMessage(error);
    this.logger.warn(
      { operation, subscriptionId, error: message },
      'Stripe call failed',
    );

    if (
      error instanceof Stripe.errors.StripeAuthenticationError ||
      error instanceof Stripe.errors.StripePermissionError
    ) {
      return gatewayFailure('authentication', message);
    }
    if (
      error instanceof Stripe.errors.StripeCardError ||
      error instanceof Stripe.errors.StripeInvalidRequestError ||
      error instanceof Stripe.errors.StripeIdempotencyError
    ) {
      return gatewayFailure('business_rule', message);
    }
    return gatewayFailure('network', message);
  }
}
