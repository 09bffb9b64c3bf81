export enum MembershipDesiredState {
  MEMBER = 'member',
  REMOVED = 'removed',
}

export enum MembershipIntentStatus {
  PENDING = 'pending',
  APPLIED = 'applied',
  /**
   * Retries exhausted or permanent error; needs administrative attention
   */
  FAILED = 'failed',
  /**
   * A newer intent for the same subscription replaced this one before it
   * was applied
   */
  SUPERSEDED = 'superseded',
}

/**
 * Recorded instruction to grant or revoke group access, written in the same
 * transaction as the state transition that implies it
 */
export interface MembershipIntent {
  id: string;
  subscriptionId: string;
  userId: string;
  desiredState: MembershipDesiredState;
  applied: boolean;
  status: MembershipIntentStatus;
  attemptCount: number;
  lastAttemptAt: Date | null;
  nextAttemptAt: Date;
  lastError: string | null;
  createdAt: Date;
}

export interface IntentFailureUpdate {
  attemptCount: number;
  attemptedAt: Date;
  error: string;
  /**
   * Next retry time, or null when the intent is given up on
   */
  nextAttemptAt: Date | null;
}
