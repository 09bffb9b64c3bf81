import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import {
  DuplicateEventError,
  InvalidSignatureError,
  isDomainError,
  SubscriptionErrorCode,
  UnknownSubscriptionError,
} from '../../core/errors/subscription.errors';
import { logger } from '../../core/logger/logger.config';
import {
  lifecycleEventForPayment,
  NormalizedPaymentEvent,
  PaymentGateway,
  StoreTransaction,
  Subscription,
  SubscriptionState,
  SubscriptionStore,
} from '../../domain/subscriptions';
import { SUBSCRIPTION_STORE } from '../../store/store.tokens';
import { PAYMENT_GATEWAY } from '../providers/payment-gateway.tokens';
import { AppliedTransition, LifecycleService } from '../subscriptions/lifecycle.service';

export type RejectionReason = Extract<
  SubscriptionErrorCode,
  | 'invalid_signature'
  | 'malformed_payload'
  | 'invalid_transition'
  | 'unknown_subscription'
>;

export type ReconcileResult =
  | {
      outcome: 'accepted';
      providerEventId: string | null;
      duplicate: boolean;
      ignored: boolean;
      subscriptionId: string | null;
      state: SubscriptionState | null;
    }
  | { outcome: 'rejected'; reason: RejectionReason; message: string };

type ProcessedEvent =
  | { duplicate: true; subscription: Subscription }
  | { duplicate: false; applied: AppliedTransition };

const REJECTABLE: readonly SubscriptionErrorCode[] = [
  'invalid_signature',
  'malformed_payload',
  'invalid_transition',
  'unknown_subscription',
];

const isRejectionReason = (code: SubscriptionErrorCode): code is RejectionReason =>
  REJECTABLE.includes(code);

/**
 * Turns verified provider webhooks into lifecycle transitions, applying each
 * provider event at most once
 */
@Injectable()
export class WebhookReconcilerService {
  private readonly logger = logger();

  constructor(
    @Inject(SUBSCRIPTION_STORE) private readonly store: SubscriptionStore,
    @Inject(PAYMENT_GATEWAY) private readonly gateway: PaymentGateway,
    private readonly lifecycleService: LifecycleService,
  ) {}

  get providerName(): string {
    return this.gateway.providerName;
  }

  get signatureHeader(): string {
    return this.gateway.signatureHeader;
  }

  /**
   * Lock contention that outlasts the transaction retries is rethrown so
   * the provider gets a 503 and redelivers
   */
  async handle(
    rawBody: Buffer,
    signature: string | undefined,
  ): Promise<ReconcileResult> {
    try {
      return await this.reconcile(rawBody, signature);
    } catch (error) {
      if (isDomainError(error) && isRejectionReason(error.code)) {
        this.logger.warn(
          { provider: this.providerName, reason: error.code, error: error.message },
          'Webhook rejected',
        );
        return { outcome: 'rejected', reason: error.code, message: error.message };
      }
      throw error;
    }
  }

  private async reconcile(
    rawBody: Buffer,
    signature: string | undefined,
  ): Promise<ReconcileResult> {
    if (!signature || !this.gateway.verifyWebhookSignature(rawBody, signature)) {
      throw new InvalidSignatureError('Webhook signature is missing or invalid');
    }

    const parsed = this.gateway.parseWebhookEvent(rawBody);
    if (parsed.kind === 'ignored') {
      this.logger.debug(
        { providerEventId: parsed.providerEventId, reason: parsed.reason },
        'Webhook ignored',
      );
      return {
        outcome: 'accepted',
        providerEventId: parsed.providerEventId,
        duplicate: false,
        ignored: true,
        subscriptionId: null,
        state: null,
      };
    }

    const { event } = parsed;
    let processed: ProcessedEvent;
    try {
      processed = await this.lifecycleService.withTransaction((tx) =>
        this.applyEvent(tx, event, rawBody),
      );
    } catch (error) {
      if (!(error instanceof DuplicateEventError)) throw error;
      // a concurrent delivery of the same event committed first
      return this.duplicateResult(event);
    }

    if (processed.duplicate) {
      this.logger.info(
        { providerEventId: event.providerEventId, subscriptionId: processed.subscription.id },
        'Duplicate webhook acknowledged',
      );
      return {
        outcome: 'accepted',
        providerEventId: event.providerEventId,
        duplicate: true,
        ignored: false,
        subscriptionId: processed.subscription.id,
        state: processed.subscription.state,
      };
    }

    this.lifecycleService.afterCommit(processed.applied);
    return {
      outcome: 'accepted',
      providerEventId: event.providerEventId,
      duplicate: false,
      ignored: false,
      subscriptionId: processed.applied.subscription.id,
      state: processed.applied.subscription.state,
    };
  }

  private async applyEvent(
    tx: StoreTransaction,
    event: NormalizedPaymentEvent,
    rawBody: Buffer,
  ): Promise<ProcessedEvent> {
    const subscriptionId = await this.resolveSubscriptionId(event);
    const subscription = await tx.lockSubscription(subscriptionId);
    if (!subscription) {
      throw new UnknownSubscriptionError(
        `Subscription ${subscriptionId} referenced by ${event.providerEventId} does not exist`,
      );
    }

    if (await tx.findPaymentEvent(event.providerEventId)) {
      return { duplicate: true, subscription };
    }

    const paymentEvent = await tx.insertPaymentEvent({
      id: randomUUID(),
      providerEventId: event.providerEventId,
      subscriptionId: subscription.id,
      kind: event.kind,
      rawPayload: rawBody.toString('utf8'),
      processedAt: null,
      receivedAt: new Date(),
    });

    const applied = await this.lifecycleService.applyTransition(
      tx,
      subscription,
      lifecycleEventForPayment(event.kind),
      {
        occurredAt: event.occurredAt,
        providerSubscriptionRef: event.providerSubscriptionRef,
      },
    );

    await tx.markPaymentEventProcessed(paymentEvent.id, new Date());
    return { duplicate: false, applied };
  }

  private async resolveSubscriptionId(
    event: NormalizedPaymentEvent,
  ): Promise<string> {
    if (event.subscriptionId) {
      return event.subscriptionId;
    }
    if (event.providerSubscriptionRef) {
      const subscription = await this.store.findSubscriptionByProviderRef(
        this.providerName,
        event.providerSubscriptionRef,
      );
      if (subscription) return subscription.id;
    }
    throw new UnknownSubscriptionError(
      `No subscription matches provider event ${event.providerEventId}`,
    );
  }

  private async duplicateResult(
    event: NormalizedPaymentEvent,
  ): Promise<ReconcileResult> {
    const recorded = await this.store.findPaymentEvent(event.providerEventId);
    const subscription = recorded
      ? await this.store.findSubscriptionById(recorded.subscriptionId)
      : null;
    return {
      outcome: 'accepted',
      providerEventId: event.providerEventId,
      duplicate: true,
      ignored: false,
      subscriptionId: subscription?.id ?? null,
      state: subscription?.state ?? null,
    };
  }
}
