import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import { PaymentEventKind } from '../../../domain/subscriptions';

export const PAYMENT_EVENT_UNIQUE_CONSTRAINT =
  'uq_payment_events_provider_event_id';

@Entity('payment_events')
@Index(PAYMENT_EVENT_UNIQUE_CONSTRAINT, ['providerEventId'], { unique: true })
@Index('ix_payment_events_subscription', ['subscriptionId'])
export class PaymentEventEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Column('varchar', { name: 'provider_event_id', length: 255 })
  providerEventId!: string;

  @Column('uuid', { name: 'subscription_id' })
  subscriptionId!: string;

  @Column('varchar', { length: 32 })
  kind!: PaymentEventKind;

  @Column('text', { name: 'raw_payload' })
  rawPayload!: string;

  @Column('timestamptz', { name: 'processed_at', nullable: true })
  processedAt!: Date | null;

  @Column('timestamptz', { name: 'received_at' })
  receivedAt!: Date;
}
