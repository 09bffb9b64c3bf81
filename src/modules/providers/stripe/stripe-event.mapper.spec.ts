import { MalformedPayloadError } from '../../../core/errors/subscription.errors';
import { PaymentEventKind } from '../../../domain/subscriptions';
import { mapStripeEvent } from './stripe-event.mapper';

const invoiceEvent = (
  type: string,
  invoice: Record<string, unknown>,
): Record<string, unknown> => ({
  id: 'evt_100',
  type,
  created: 1709251200,
  data: { object: invoice },
});

describe('mapStripeEvent', () => {
  it('should map the first paid invoice to a charge success', () => {
    const parsed = mapStripeEvent(
      invoiceEvent('invoice.payment_succeeded', {
        id: 'in_1',
        billing_reason: 'subscription_create',
        subscription: 'sub_1',
        amount_paid: 999,
        currency: 'usd',
        subscription_details: { metadata: { subscription_id: 'local-1' } },
      }),
    );

    expect(parsed).toEqual({
      kind: 'event',
      event: {
        providerEventId: 'evt_100',
        kind: PaymentEventKind.CHARGE_SUCCEEDED,
        subscriptionId: 'local-1',
        providerSubscriptionRef: 'sub_1',
        occurredAt: new Date('2024-03-01T00:00:00.000Z'),
        amountMinor: 999,
        currency: 'USD',
      },
    });
  });

  it('should map a failed cycle invoice to a renewal failure', () => {
    const parsed = mapStripeEvent(
      invoiceEvent('invoice.payment_failed', {
        billing_reason: 'subscription_cycle',
        subscription: { id: 'sub_2' },
        amount_due: 1299,
        metadata: { subscription_id: 'local-2' },
      }),
    );

    expect(parsed).toMatchObject({
      kind: 'event',
      event: {
        kind: PaymentEventKind.RENEWAL_CHARGE_FAILED,
        subscriptionId: 'local-2',
        providerSubscriptionRef: 'sub_2',
        amountMinor: 1299,
        currency: null,
      },
    });
  });

  it('should map a paid cycle invoice to a renewal success', () => {
    const parsed = mapStripeEvent(
      invoiceEvent('invoice.payment_succeeded', {
        billing_reason: 'subscription_cycle',
        subscription: 'sub_3',
      }),
    );

    expect(parsed).toMatchObject({
      kind: 'event',
      event: {
        kind: PaymentEventKind.RENEWAL_CHARGE_SUCCEEDED,
        subscriptionId: null,
        providerSubscriptionRef: 'sub_3',
      },
    });
  });

  it('should ignore invoices for other billing reasons', () => {
    expect(
      mapStripeEvent(
        invoiceEvent('invoice.payment_succeeded', { billing_reason: 'manual' }),
      ),
    ).toEqual({
      kind: 'ignored',
      providerEventId: 'evt_100',
      reason: 'Invoice billing_reason manual is not tracked',
    });
  });

  it('should map a deleted subscription to a provider cancellation', () => {
    const parsed = mapStripeEvent({
      id: 'evt_200',
      type: 'customer.subscription.deleted',
      created: 1709251200,
      data: { object: { id: 'sub_4', metadata: { subscription_id: 'local-4' } } },
    });

    expect(parsed).toEqual({
      kind: 'event',
      event: {
        providerEventId: 'evt_200',
        kind: PaymentEventKind.SUBSCRIPTION_CANCELED,
        subscriptionId: 'local-4',
        providerSubscriptionRef: 'sub_4',
        occurredAt: new Date('2024-03-01T00:00:00.000Z'),
        amountMinor: null,
        currency: null,
      },
    });
  });

  it('should acknowledge unrelated event types', () => {
    expect(
      mapStripeEvent({
        id: 'evt_300',
        type: 'customer.created',
        created: 1709251200,
        data: { object: {} },
      }),
    ).toEqual({
      kind: 'ignored',
      providerEventId: 'evt_300',
      reason: 'Unhandled event type customer.created',
    });
  });

  it.each([
    [{ type: 'customer.created', created: 1, data: { object: {} } }],
    [{ id: 'evt_1', created: 1, data: { object: {} } }],
    [{ id: 'evt_1', type: 'customer.created', data: { object: {} } }],
    [{ id: 'evt_1', type: 'customer.created', created: 1, data: {} }],
  ])('should reject an envelope missing required fields: %j', (payload) => {
    expect(() => mapStripeEvent(payload)).toThrow(MalformedPayloadError);
  });
});
