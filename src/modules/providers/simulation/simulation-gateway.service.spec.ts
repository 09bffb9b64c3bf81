import { createHmac } from 'node:crypto';
import { MalformedPayloadError } from '../../../core/errors/subscription.errors';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import { PaymentEventKind } from '../../../domain/subscriptions';
import { testConfig } from '../../../../test/support/test-config';
import { SimulationGateway } from './simulation-gateway.service';

const occurredAt = new Date('2024-03-01T12:00:00.000Z');

describe('SimulationGateway', () => {
  let gateway: SimulationGateway;

  beforeEach(() => {
    gateway = new SimulationGateway(testConfig(), new PayloadValidatorService());
  });

  describe('webhook signatures', () => {
    it('should accept an HMAC-SHA256 hex signature over the raw body', () => {
      const body = '{"id":"evt_1"}';
      const signature = createHmac('sha256', 'test-secret').update(body).digest('hex');

      expect(gateway.verifyWebhookSignature(Buffer.from(body), signature)).toBe(true);
      expect(
        gateway.verifyWebhookSignature(Buffer.from(body), ` ${signature.toUpperCase()} `),
      ).toBe(true);
    });

    it('should reject a signature over a different body', () => {
      const { body, signature } = gateway.buildWebhook({
        id: 'evt_1',
        type: 'charge.succeeded',
        subscriptionId: 'sub-1',
        occurredAt,
      });

      expect(
        gateway.verifyWebhookSignature(Buffer.from(body.replace('evt_1', 'evt_2')), signature),
      ).toBe(false);
      expect(gateway.verifyWebhookSignature(Buffer.from(body), 'abc')).toBe(false);
    });

    it('should reject everything when no secret is configured', () => {
      const unconfigured = new SimulationGateway(
        testConfig({ SIMULATION_WEBHOOK_SECRET: '' }),
        new PayloadValidatorService(),
      );
      const body = '{}';

      expect(unconfigured.verifyWebhookSignature(Buffer.from(body), unconfigured.sign(body))).toBe(
        false,
      );
    });
  });

  describe('parseWebhookEvent', () => {
    it('should normalize a charge success', () => {
      const { body } = gateway.buildWebhook({
        id: 'evt_1',
        type: 'charge.succeeded',
        subscriptionId: 'sub-1',
        amountMinor: 999,
        currency: 'USD',
        occurredAt,
      });

      expect(gateway.parseWebhookEvent(Buffer.from(body))).toEqual({
        kind: 'event',
        event: {
          providerEventId: 'evt_1',
          kind: PaymentEventKind.CHARGE_SUCCEEDED,
          subscriptionId: 'sub-1',
          providerSubscriptionRef: null,
          occurredAt,
          amountMinor: 999,
          currency: 'USD',
        },
      });
    });

    it('should ignore event types it does not track', () => {
      const { body } = gateway.buildWebhook({
        id: 'evt_2',
        type: 'customer.updated',
        subscriptionId: 'sub-1',
      });

      expect(gateway.parseWebhookEvent(Buffer.from(body))).toEqual({
        kind: 'ignored',
        providerEventId: 'evt_2',
        reason: 'Unhandled event type customer.updated',
      });
    });

    it('should reject an event that names no subscription', () => {
      const { body } = gateway.buildWebhook({ id: 'evt_3', type: 'renewal.failed' });

      expect(() => gateway.parseWebhookEvent(Buffer.from(body))).toThrow(
        'Event names neither subscription_id nor provider_subscription_ref',
      );
    });

    it.each([
      ['not json'],
      ['[1,2]'],
      ['{"id":"evt_4","type":"charge.succeeded","subscription_id":"s"}'],
      ['{"id":"","type":"charge.succeeded","occurred_at":"2024-03-01T00:00:00Z"}'],
    ])('should reject malformed body %s', (body) => {
      expect(() => gateway.parseWebhookEvent(Buffer.from(body))).toThrow(
        MalformedPayloadError,
      );
    });
  });

  describe('outbound calls', () => {
    const paymentRequest = {
      subscriptionId: 'sub-1',
      userId: 'user-1',
      amountMinor: 999,
      currency: 'USD',
      billingPeriodDays: 30,
      description: 'Community access (30 days)',
      idempotencyKey: 'sub-1:initial:2024-03-01T00:00:00.000Z',
    };

    it('should return the same payment for the same idempotency key', async () => {
      const first = await gateway.createPayment(paymentRequest);
      const second = await gateway.createPayment(paymentRequest);
      const other = await gateway.createPayment({
        ...paymentRequest,
        idempotencyKey: 'sub-1:initial:2024-03-02T00:00:00.000Z',
      });

      if (!first.ok || !second.ok || !other.ok) throw new Error('expected success');
      expect(second.value).toEqual(first.value);
      expect(other.value.paymentId).not.toBe(first.value.paymentId);
      expect(first.value.paymentId).toMatch(/^sim_pay_[0-9a-f]{24}$/);
      expect(first.value.paymentUrl).toBe(
        `https://checkout.simulation.invalid/pay/${first.value.paymentId}`,
      );
      expect(first.value.providerSubscriptionRef).toMatch(/^sim_sub_[0-9a-f]{24}$/);
      expect(gateway.listCalls('payment')).toHaveLength(2);
    });

    it('should fail the next call when told to', async () => {
      gateway.failNextCall('business_rule');

      const failed = await gateway.createRecurringCharge({
        subscriptionId: 'sub-1',
        userId: 'user-1',
        providerSubscriptionRef: null,
        amountMinor: 999,
        currency: 'USD',
        idempotencyKey: 'sub-1:renewal:2024-03-31T00:00:00.000Z',
      });
      const succeeded = await gateway.cancelRecurringCharge({
        subscriptionId: 'sub-1',
        providerSubscriptionRef: 'sim_sub_1',
        idempotencyKey: 'sub-1:cancel:2024-03-05T00:00:00.000Z',
        atPeriodEnd: false,
      });

      expect(failed).toEqual({
        ok: false,
        error: {
          kind: 'business_rule',
          message: 'Simulated business_rule failure',
          retryable: false,
        },
      });
      expect(succeeded).toEqual({ ok: true, value: undefined });
      expect(gateway.listCalls().map((call) => call.operation)).toEqual(['cancel']);
    });

    it('should leave renewals to the sweeper', () => {
      expect(gateway.getCapabilities().managesRenewals).toBe(false);
    });
  });
});
