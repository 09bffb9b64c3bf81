import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import { SubscriptionState } from '../../../domain/subscriptions';

@Entity('subscriptions')
@Index('uq_subscriptions_open_user', ['userId'], {
  unique: true,
  where: `"state" IN ('pending', 'active', 'grace_period')`,
})
@Index('ix_subscriptions_state_period_end', ['state', 'currentPeriodEnd'])
@Index('ix_subscriptions_provider_ref', ['providerName', 'providerSubscriptionRef'])
export class SubscriptionEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Column('varchar', { name: 'user_id', length: 64 })
  userId!: string;

  @Column('varchar', { name: 'plan_id', length: 64 })
  planId!: string;

  @Column('integer', { name: 'amount_minor' })
  amountMinor!: number;

  @Column('char', { length: 3 })
  currency!: string;

  @Column('integer', { name: 'billing_period_days' })
  billingPeriodDays!: number;

  @Column('varchar', { length: 16 })
  state!: SubscriptionState;

  @Column('timestamptz', { name: 'current_period_end', nullable: true })
  currentPeriodEnd!: Date | null;

  @Column('boolean', { name: 'auto_renew', default: true })
  autoRenew!: boolean;

  @Column('varchar', { name: 'provider_name', length: 32 })
  providerName!: string;

  @Column('varchar', {
    name: 'provider_subscription_ref',
    length: 255,
    nullable: true,
  })
  providerSubscriptionRef!: string | null;

  @Column('timestamptz', { name: 'created_at' })
  createdAt!: Date;

  @Column('timestamptz', { name: 'updated_at' })
  updatedAt!: Date;
}
