import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import {
  MembershipDesiredState,
  MembershipIntentStatus,
} from '../../../domain/subscriptions';

@Entity('membership_intents')
@Index('ix_membership_intents_due', ['status', 'nextAttemptAt'])
@Index('ix_membership_intents_subscription', ['subscriptionId'])
@Index('ix_membership_intents_user', ['userId', 'createdAt'])
export class MembershipIntentEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Column('uuid', { name: 'subscription_id' })
  subscriptionId!: string;

  @Column('varchar', { name: 'user_id', length: 64 })
  userId!: string;

  @Column('varchar', { name: 'desired_state', length: 16 })
  desiredState!: MembershipDesiredState;

  @Column('boolean', { default: false })
  applied!: boolean;

  @Column('varchar', { length: 16 })
  status!: MembershipIntentStatus;

  @Column('integer', { name: 'attempt_count', default: 0 })
  attemptCount!: number;

  @Column('timestamptz', { name: 'last_attempt_at', nullable: true })
  lastAttemptAt!: Date | null;

  @Column('timestamptz', { name: 'next_attempt_at' })
  nextAttemptAt!: Date;

  @Column('text', { name: 'last_error', nullable: true })
  lastError!: string | null;

  @Column('timestamptz', { name: 'created_at' })
  createdAt!: Date;
}
