export const DEFAULT_PLAN_ID = 'default';

export interface Plan {
  id: string;
  name: string;
  amountMinor: number;

  /**
   * Price offered to users whose earlier subscription has ended; falls back
   * to amountMinor when null
   */
  returningAmountMinor: number | null;

  currency: string;
  billingPeriodDays: number;
  updatedAt: Date;
}
