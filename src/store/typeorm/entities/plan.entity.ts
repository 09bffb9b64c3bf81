import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity('plans')
export class PlanEntity {
  @PrimaryColumn('varchar', { length: 64 })
  id!: string;

  @Column('varchar', { length: 128 })
  name!: string;

  @Column('integer', { name: 'amount_minor' })
  amountMinor!: number;

  @Column('integer', { name: 'returning_amount_minor', nullable: true })
  returningAmountMinor!: number | null;

  @Column('char', { length: 3 })
  currency!: string;

  @Column('integer', { name: 'billing_period_days' })
  billingPeriodDays!: number;

  @Column('timestamptz', { name: 'updated_at' })
  updatedAt!: Date;
}
