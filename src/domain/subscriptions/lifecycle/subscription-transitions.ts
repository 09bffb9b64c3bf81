import { InvalidTransitionError } from '../../../core/errors/subscription.errors';
import { PaymentEventKind } from '../models/payment-event.model';
import {
  isTerminalState,
  SubscriptionState,
} from '../models/subscription.model';

/**
 * Triggers the state machine reacts to: provider events, user actions and
 * sweeper decisions
 */
export enum LifecycleEvent {
  CHARGE_SUCCEEDED = 'charge_succeeded',
  CHARGE_FAILED = 'charge_failed',
  RENEWAL_CHARGE_SUCCEEDED = 'renewal_charge_succeeded',
  RENEWAL_CHARGE_FAILED = 'renewal_charge_failed',
  USER_CANCEL = 'user_cancel',
  PROVIDER_CANCEL = 'provider_cancel',
  GRACE_WINDOW_ELAPSED = 'grace_window_elapsed',
  PERIOD_ELAPSED = 'period_elapsed',
}

export type MembershipChange = 'grant' | 'revoke';

export interface TransitionOutcome {
  nextState: SubscriptionState;
  membership: MembershipChange | null;
  /**
   * A new paid period starts (first charge or renewal)
   */
  extendsPeriod: boolean;
  /**
   * False for the no-op applied to terminal subscriptions
   */
  changed: boolean;
}

type TransitionRule = Omit<TransitionOutcome, 'changed'>;

const rule = (
  nextState: SubscriptionState,
  membership: MembershipChange | null = null,
  extendsPeriod = false,
): TransitionRule => ({ nextState, membership, extendsPeriod });

const OPEN_STATE_RULES: Record<
  SubscriptionState.PENDING | SubscriptionState.ACTIVE | SubscriptionState.GRACE_PERIOD,
  Partial<Record<LifecycleEvent, TransitionRule>>
> = {
  [SubscriptionState.PENDING]: {
    [LifecycleEvent.CHARGE_SUCCEEDED]: rule(SubscriptionState.ACTIVE, 'grant', true),
    [LifecycleEvent.CHARGE_FAILED]: rule(SubscriptionState.CANCELED),
    [LifecycleEvent.USER_CANCEL]: rule(SubscriptionState.CANCELED),
    [LifecycleEvent.PROVIDER_CANCEL]: rule(SubscriptionState.CANCELED),
  },
  [SubscriptionState.ACTIVE]: {
    [LifecycleEvent.RENEWAL_CHARGE_SUCCEEDED]: rule(SubscriptionState.ACTIVE, null, true),
    [LifecycleEvent.RENEWAL_CHARGE_FAILED]: rule(SubscriptionState.GRACE_PERIOD),
    [LifecycleEvent.USER_CANCEL]: rule(SubscriptionState.CANCELED, 'revoke'),
    [LifecycleEvent.PROVIDER_CANCEL]: rule(SubscriptionState.CANCELED, 'revoke'),
    [LifecycleEvent.PERIOD_ELAPSED]: rule(SubscriptionState.EXPIRED, 'revoke'),
  },
  [SubscriptionState.GRACE_PERIOD]: {
    [LifecycleEvent.CHARGE_SUCCEEDED]: rule(SubscriptionState.ACTIVE, null, true),
    [LifecycleEvent.RENEWAL_CHARGE_SUCCEEDED]: rule(SubscriptionState.ACTIVE, null, true),
    // a failed provider retry keeps the window running; it does not restart it
    [LifecycleEvent.RENEWAL_CHARGE_FAILED]: rule(SubscriptionState.GRACE_PERIOD),
    [LifecycleEvent.GRACE_WINDOW_ELAPSED]: rule(SubscriptionState.EXPIRED, 'revoke'),
    [LifecycleEvent.USER_CANCEL]: rule(SubscriptionState.CANCELED, 'revoke'),
    [LifecycleEvent.PROVIDER_CANCEL]: rule(SubscriptionState.CANCELED, 'revoke'),
  },
};

const rulesFor = (
  state: SubscriptionState,
): Partial<Record<LifecycleEvent, TransitionRule>> | undefined => {
  switch (state) {
    case SubscriptionState.PENDING:
    case SubscriptionState.ACTIVE:
    case SubscriptionState.GRACE_PERIOD:
      return OPEN_STATE_RULES[state];
    default:
      return undefined;
  }
};

/**
 * Pure transition function of the subscription state machine.
 *
 * Terminal states absorb every event as a no-op. Any pair missing from the
 * table is an error the caller must surface.
 *
 * @throws InvalidTransitionError
 */
export function transition(
  state: SubscriptionState,
  event: LifecycleEvent,
): TransitionOutcome {
  if (isTerminalState(state)) {
    return {
      nextState: state,
      membership: null,
      extendsPeriod: false,
      changed: false,
    };
  }

  const matched = rulesFor(state)?.[event];
  if (!matched) {
    throw new InvalidTransitionError(state, event);
  }

  return { ...matched, changed: true };
}

const EVENT_BY_PAYMENT_KIND: Record<PaymentEventKind, LifecycleEvent> = {
  [PaymentEventKind.CHARGE_SUCCEEDED]: LifecycleEvent.CHARGE_SUCCEEDED,
  [PaymentEventKind.CHARGE_FAILED]: LifecycleEvent.CHARGE_FAILED,
  [PaymentEventKind.RENEWAL_CHARGE_SUCCEEDED]: LifecycleEvent.RENEWAL_CHARGE_SUCCEEDED,
  [PaymentEventKind.RENEWAL_CHARGE_FAILED]: LifecycleEvent.RENEWAL_CHARGE_FAILED,
  [PaymentEventKind.SUBSCRIPTION_CANCELED]: LifecycleEvent.PROVIDER_CANCEL,
};

export const lifecycleEventForPayment = (kind: PaymentEventKind): LifecycleEvent =>
  EVENT_BY_PAYMENT_KIND[kind];

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * End of the next paid period. Renewals paid early extend from the current
 * period end; late payments extend from the payment time.
 */
export function nextPeriodEnd(
  currentPeriodEnd: Date | null,
  occurredAt: Date,
  billingPeriodDays: number,
): Date {
  const base =
    currentPeriodEnd && currentPeriodEnd.getTime() > occurredAt.getTime()
      ? currentPeriodEnd
      : occurredAt;
  return new Date(base.getTime() + billingPeriodDays * DAY_MS);
}
