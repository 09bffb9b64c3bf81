/**
 * Payment event kinds understood by the lifecycle engine, normalized
 * across providers
 */
export enum PaymentEventKind {
  CHARGE_SUCCEEDED = 'charge_succeeded',
  CHARGE_FAILED = 'charge_failed',
  RENEWAL_CHARGE_SUCCEEDED = 'renewal_charge_succeeded',
  RENEWAL_CHARGE_FAILED = 'renewal_charge_failed',
  SUBSCRIPTION_CANCELED = 'subscription_canceled',
}

export interface PaymentEvent {
  id: string;

  /**
   * Idempotency key supplied by the provider; globally unique
   */
  providerEventId: string;

  subscriptionId: string;
  kind: PaymentEventKind;

  /**
   * Body exactly as delivered, kept for audit and replay
   */
  rawPayload: string;

  /**
   * null until the event has been applied
   */
  processedAt: Date | null;

  receivedAt: Date;
}
