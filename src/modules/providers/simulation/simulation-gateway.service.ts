import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, createHmac, timingSafeEqual } from 'node:crypto';
import { MalformedPayloadError } from '../../../core/errors/subscription.errors';
import { logger } from '../../../core/logger/logger.config';
import { ProviderMetadata } from '../../../core/providers/provider-metadata.decorator';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import {
  CancelRecurringRequest,
  ChargeReceipt,
  CreatePaymentRequest,
  GatewayCapabilities,
  GatewayErrorKind,
  gatewayFailure,
  gatewayOk,
  GatewayResult,
  ParsedWebhook,
  PaymentEventKind,
  PaymentGateway,
  PaymentSession,
  RecurringChargeRequest,
} from '../../../domain/subscriptions';
import { SimulationWebhookDto } from './dto/simulation-webhook.dto';

export const SIMULATION_EVENT_TYPES: Record<string, PaymentEventKind> = {
  'charge.succeeded': PaymentEventKind.CHARGE_SUCCEEDED,
  'charge.failed': PaymentEventKind.CHARGE_FAILED,
  'renewal.succeeded': PaymentEventKind.RENEWAL_CHARGE_SUCCEEDED,
  'renewal.failed': PaymentEventKind.RENEWAL_CHARGE_FAILED,
  'subscription.canceled': PaymentEventKind.SUBSCRIPTION_CANCELED,
};

export type SimulatedOperation = 'payment' | 'recurring_charge' | 'cancel';

export interface SimulatedCall {
  operation: SimulatedOperation;
  subscriptionId: string;
  idempotencyKey: string;
  resultId: string;
  amountMinor: number | null;
}

export interface SimulatedEventInput {
  id: string;
  type: string;
  subscriptionId?: string;
  providerSubscriptionRef?: string;
  amountMinor?: number;
  currency?: string;
  occurredAt?: Date;
}

const shortDigest = (value: string): string =>
  createHash('sha256').update(value).digest('hex').slice(0, 24);

/**
 * Deterministic in-process payment backend
 *
 * Ids are derived from the idempotency key, so repeating a call with the
 * same key returns the same payment or charge. Webhook bodies are signed
 * with HMAC-SHA256 (hex) under SIMULATION_WEBHOOK_SECRET.
 */
@Injectable()
@ProviderMetadata({
  name: 'simulation',
  displayName: 'Simulation',
  description: 'Deterministic payment backend for local runs and tests',
})
export class SimulationGateway implements PaymentGateway {
  private readonly logger = logger();
  readonly providerName = 'simulation';
  readonly signatureHeader = 'x-signature';

  private readonly webhookSecret: string;
  private readonly calls = new Map<string, SimulatedCall>();
  private readonly scriptedFailures: GatewayErrorKind[] = [];

  constructor(
    private readonly configService: ConfigService,
    private readonly payloadValidator: PayloadValidatorService,
  ) {
    this.webhookSecret =
      this.configService.get<string>('SIMULATION_WEBHOOK_SECRET') || '';
  }

  async createPayment(
    request: CreatePaymentRequest,
  ): Promise<GatewayResult<PaymentSession>> {
    const failure = this.takeScriptedFailure<PaymentSession>();
    if (failure) return failure;

    const call = this.record('payment', 'sim_pay', request);
    return gatewayOk({
      paymentId: call.resultId,
      paymentUrl: `https://checkout.simulation.invalid/pay/${call.resultId}`,
      providerSubscriptionRef: `sim_sub_${shortDigest(request.subscriptionId)}`,
    });
  }

  async createRecurringCharge(
    request: RecurringChargeRequest,
  ): Promise<GatewayResult<ChargeReceipt>> {
    const failure = this.takeScriptedFailure<ChargeReceipt>();
    if (failure) return failure;

    const call = this.record('recurring_charge', 'sim_ch', request);
    return gatewayOk({ chargeId: call.resultId, status: 'initiated' });
  }

  async cancelRecurringCharge(
    request: CancelRecurringRequest,
  ): Promise<GatewayResult<void>> {
    const failure = this.takeScriptedFailure<void>();
    if (failure) return failure;

    this.record('cancel', 'sim_cancel', { ...request, amountMinor: null });
    return gatewayOk(undefined);
  }

  verifyWebhookSignature(rawBody: Buffer, signature: string): boolean {
    if (!this.webhookSecret) {
      this.logger.error('SIMULATION_WEBHOOK_SECRET is not configured');
      return false;
    }

    const expected = Buffer.from(this.sign(rawBody), 'utf8');
    const received = Buffer.from(signature.trim().toLowerCase(), 'utf8');
    return (
      expected.length === received.length && timingSafeEqual(expected, received)
    );
  }

  parseWebhookEvent(rawBody: Buffer): ParsedWebhook {
    const dto = this.payloadValidator.parseAndValidate(
      rawBody,
      SimulationWebhookDto,
    );

    const kind = SIMULATION_EVENT_TYPES[dto.type];
    if (!kind) {
      return {
        kind: 'ignored',
        providerEventId: dto.id,
        reason: `Unhandled event type ${dto.type}`,
      };
    }

    if (!dto.subscription_id && !dto.provider_subscription_ref) {
      throw new MalformedPayloadError(
        'Event names neither subscription_id nor provider_subscription_ref',
      );
    }

    return {
      kind: 'event',
      event: {
        providerEventId: dto.id,
        kind,
        subscriptionId: dto.subscription_id ?? null,
        providerSubscriptionRef: dto.provider_subscription_ref ?? null,
        occurredAt: new Date(dto.occurred_at),
        amountMinor: dto.amount_minor ?? null,
        currency: dto.currency ?? null,
      },
    };
  }

  getCapabilities(): GatewayCapabilities {
    return { managesRenewals: false };
  }

  async isHealthy(): Promise<boolean> {
    return this.webhookSecret.length > 0;
  }

  sign(rawBody: Buffer | string): string {
    return createHmac('sha256', this.webhookSecret).update(rawBody).digest('hex');
  }

  /**
   * Builds a signed webhook delivery the way the simulated backend would send it
   */
  buildWebhook(input: SimulatedEventInput): { body: string; signature: string } {
    const body = JSON.stringify({
      id: input.id,
      type: input.type,
      subscription_id: input.subscriptionId,
      provider_subscription_ref: input.providerSubscriptionRef,
      amount_minor: input.amountMinor,
      currency: input.currency,
      occurred_at: (input.occurredAt ?? new Date()).toISOString(),
    });
    return { body, signature: this.sign(body) };
  }

  /**
   * Makes the next outbound call fail with the given kind
   */
  failNextCall(kind: GatewayErrorKind): void {
    this.scriptedFailures.push(kind);
  }

  listCalls(operation?: SimulatedOperation): SimulatedCall[] {
    return [...this.calls.values()].filter(
      (call) => !operation || call.operation === operation,
    );
  }

  private record(
    operation: SimulatedOperation,
    prefix: string,
    request: {
      subscriptionId: string;
      idempotencyKey: string;
      amountMinor: number | null;
    },
  ): SimulatedCall {
    const existing = this.calls.get(request.idempotencyKey);
    if (existing) return existing;

    const call: SimulatedCall = {
      operation,
      subscriptionId: request.subscriptionId,
      idempotencyKey: request.idempotencyKey,
      resultId: `${prefix}_${shortDigest(request.idempotencyKey)}`,
      amountMinor: request.amountMinor,
    };
    this.calls.set(request.idempotencyKey, call);
    this.logger.debug(
      { operation, subscriptionId: request.subscriptionId, id: call.resultId },
      'Simulated provider call',
    );
    return call;
  }

  private takeScriptedFailure<T>(): GatewayResult<T> | null {
    const kind = this.scriptedFailures.shift();
    return kind ? gatewayFailure<T>(kind, `Simulated ${kind} failure`) : null;
  }
}
