import { MalformedPayloadError } from '../../../core/errors/subscription.errors';
import { ParsedWebhook, PaymentEventKind } from '../../../domain/subscriptions';

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readRecord = (source: JsonRecord | null, key: string): JsonRecord | null => {
  const value = source?.[key];
  return isRecord(value) ? value : null;
};

const readString = (source: JsonRecord | null, key: string): string | null => {
  const value = source?.[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
};

const readNumber = (source: JsonRecord | null, key: string): number | null => {
  const value = source?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
};

/**
 * The invoice's subscription id; a string, or an expanded object with an id
 */
const readSubscriptionRef = (invoice: JsonRecord): string | null =>
  readString(invoice, 'subscription') ??
  readString(readRecord(invoice, 'subscription'), 'id');

const invoiceEventKind = (
  type: string,
  billingReason: string | null,
): PaymentEventKind | null => {
  const succeeded = type === 'invoice.payment_succeeded';
  switch (billingReason) {
    case 'subscription_create':
      return succeeded
        ? PaymentEventKind.CHARGE_SUCCEEDED
        : PaymentEventKind.CHARGE_FAILED;
    case 'subscription_cycle':
      return succeeded
        ? PaymentEventKind.RENEWAL_CHARGE_SUCCEEDED
        : PaymentEventKind.RENEWAL_CHARGE_FAILED;
    default:
      return null;
  }
};

/**
 * Maps a verified Stripe event body onto the normalized event set
 *
 * invoice.payment_succeeded / invoice.payment_failed are split by
 * billing_reason into first charge and renewal;
 * customer.subscription.deleted becomes subscription_canceled.
 * Everything else is acknowledged and ignored.
 */
export const mapStripeEvent = (payload: JsonRecord): ParsedWebhook => {
  const providerEventId = readString(payload, 'id');
  const type = readString(payload, 'type');
  const created = readNumber(payload, 'created');
  const object = readRecord(readRecord(payload, 'data'), 'object');

  if (!providerEventId || !type || created === null || !object) {
    throw new MalformedPayloadError(
      'Stripe event must carry id, type, created and data.object',
    );
  }

  const occurredAt = new Date(created * 1000);

  switch (type) {
    case 'invoice.payment_succeeded':
    case 'invoice.payment_failed': {
      const billingReason = readString(object, 'billing_reason');
      const kind = invoiceEventKind(type, billingReason);
      if (!kind) {
        return {
          kind: 'ignored',
          providerEventId,
          reason: `Invoice billing_reason ${billingReason ?? 'missing'} is not tracked`,
        };
      }

      const subscriptionMetadata =
        readRecord(readRecord(object, 'subscription_details'), 'metadata') ??
        readRecord(object, 'metadata');
      const currency = readString(object, 'currency');

      return {
        kind: 'event',
        event: {
          providerEventId,
          kind,
          subscriptionId: readString(subscriptionMetadata, 'subscription_id'),
          providerSubscriptionRef: readSubscriptionRef(object),
          occurredAt,
          amountMinor: readNumber(
            object,
            type === 'invoice.payment_succeeded' ? 'amount_paid' : 'amount_due',
          ),
          currency: currency ? currency.toUpperCase() : null,
        },
      };
    }

    case 'customer.subscription.deleted':
      return {
        kind: 'event',
        event: {
          providerEventId,
          kind: PaymentEventKind.SUBSCRIPTION_CANCELED,
          subscriptionId: readString(
            readRecord(object, 'metadata'),
            'subscription_id',
          ),
          providerSubscriptionRef: readString(object, 'id'),
          occurredAt,
          amountMinor: null,
          currency: null,
        },
      };

    default:
      return {
        kind: 'ignored',
        providerEventId,
        reason: `Unhandled event type ${type}`,
      };
  }
};
