/**
 * Capability interface every payment backend implements
 *
 * One implementation per backend (Stripe, the deterministic simulation, ...),
 * chosen once at startup by configuration. Mutating calls take a
 * client-supplied idempotency key derived from (subscription id, intent kind,
 * period marker) so retries are safe on the provider side.
 *
 * Failures come back as tagged results; a failed or timed-out call never
 * changes subscription state by itself. Only webhooks confirm charges.
 */

import { PaymentEventKind } from '../models/payment-event.model';

export type GatewayErrorKind =
  | 'network'
  | 'timeout'
  | 'authentication'
  | 'business_rule';

export interface GatewayError {
  kind: GatewayErrorKind;
  message: string;
  retryable: boolean;
}

export type GatewayResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: GatewayError };

export const gatewayOk = <T>(value: T): GatewayResult<T> => ({
  ok: true,
  value,
});

export const gatewayFailure = <T = never>(
  kind: GatewayErrorKind,
  message: string,
): GatewayResult<T> => ({
  ok: false,
  error: {
    kind,
    message,
    retryable: kind === 'network' || kind === 'timeout',
  },
});

export type IdempotentOperation = 'initial' | 'renewal' | 'cancel';

/**
 * `<subscriptionId>:<operation>:<period marker>`; the same logical attempt
 * always yields the same key
 */
export const idempotencyKey = (
  subscriptionId: string,
  operation: IdempotentOperation,
  periodMarker: Date,
): string => `${subscriptionId}:${operation}:${periodMarker.toISOString()}`;

export interface CreatePaymentRequest {
  subscriptionId: string;
  userId: string;
  amountMinor: number;
  currency: string;
  billingPeriodDays: number;
  description: string;
  idempotencyKey: string;
}

export interface PaymentSession {
  paymentId: string;
  paymentUrl: string | null;
  providerSubscriptionRef: string | null;
}

export interface RecurringChargeRequest {
  subscriptionId: string;
  userId: string;
  providerSubscriptionRef: string | null;
  amountMinor: number;
  currency: string;
  idempotencyKey: string;
}

export interface ChargeReceipt {
  chargeId: string;
  /**
   * 'initiated' means the outcome arrives later by webhook
   */
  status: 'initiated' | 'not_required';
}

export interface CancelRecurringRequest {
  subscriptionId: string;
  providerSubscriptionRef: string;
  idempotencyKey: string;

  /**
   * Stop future charges but let the paid period run out instead of
   * ending the provider subscription now
   */
  atPeriodEnd: boolean;

  reason?: string;
}

/**
 * Provider-agnostic event extracted from a verified webhook body
 */
export interface NormalizedPaymentEvent {
  providerEventId: string;
  kind: PaymentEventKind;

  /**
   * Our subscription id, when the provider echoes our metadata back
   */
  subscriptionId: string | null;

  providerSubscriptionRef: string | null;
  occurredAt: Date;
  amountMinor: number | null;
  currency: string | null;
}

export type ParsedWebhook =
  | { kind: 'event'; event: NormalizedPaymentEvent }
  | { kind: 'ignored'; providerEventId: string | null; reason: string };

export interface GatewayCapabilities {
  /**
   * The provider charges renewals on its own schedule; the sweeper then only
   * waits for the webhook instead of calling createRecurringCharge
   */
  managesRenewals: boolean;
}

export interface PaymentGateway {
  /**
   * Unique identifier for the backend (e.g. 'stripe', 'simulation')
   */
  readonly providerName: string;

  /**
   * Request header carrying the webhook signature
   */
  readonly signatureHeader: string;

  createPayment(
    request: CreatePaymentRequest,
  ): Promise<GatewayResult<PaymentSession>>;

  createRecurringCharge(
    request: RecurringChargeRequest,
  ): Promise<GatewayResult<ChargeReceipt>>;

  cancelRecurringCharge(
    request: CancelRecurringRequest,
  ): Promise<GatewayResult<void>>;

  /**
   * Verifies the signature header over the exact raw body bytes
   */
  verifyWebhookSignature(rawBody: Buffer, signature: string): boolean;

  /**
   * @throws MalformedPayloadError when the body cannot be understood
   */
  parseWebhookEvent(rawBody: Buffer): ParsedWebhook;

  getCapabilities(): GatewayCapabilities;

  isHealthy(): Promise<boolean>;
}
