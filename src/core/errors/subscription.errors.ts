/**
 * Domain error taxonomy for the subscription engine.
 *
 * Every error carries a stable `code` so HTTP mapping, logging and the
 * webhook reconciler can branch on it without string matching.
 */

import type { GatewayError } from '../../domain/subscriptions';

export type SubscriptionErrorCode =
  | 'invalid_signature'
  | 'malformed_payload'
  | 'invalid_transition'
  | 'duplicate_event'
  | 'provider_unavailable'
  | 'membership_sync_failed'
  | 'concurrent_modification'
  | 'subscription_not_found'
  | 'subscription_conflict'
  | 'plan_not_found'
  | 'unknown_subscription';

export abstract class SubscriptionDomainError extends Error {
  abstract readonly code: SubscriptionErrorCode;

  /**
   * Transient errors may succeed when retried later
   */
  readonly transient: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidSignatureError extends SubscriptionDomainError {
  readonly code = 'invalid_signature';
}

export class MalformedPayloadError extends SubscriptionDomainError {
  readonly code = 'malformed_payload';

  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
  }
}

export class InvalidTransitionError extends SubscriptionDomainError {
  readonly code = 'invalid_transition';

  constructor(
    readonly fromState: string,
    readonly event: string,
  ) {
    super(`Transition not allowed: ${fromState} --${event}-->`);
  }
}

export class DuplicateEventError extends SubscriptionDomainError {
  readonly code = 'duplicate_event';

  constructor(readonly providerEventId: string) {
    super(`Provider event ${providerEventId} already recorded`);
  }
}

export class ProviderUnavailableError extends SubscriptionDomainError {
  readonly code = 'provider_unavailable';
  override readonly transient = true;

  constructor(readonly failure: GatewayError) {
    super(failure.message);
  }
}

export class MembershipSyncFailedError extends SubscriptionDomainError {
  readonly code = 'membership_sync_failed';

  constructor(
    message: string,
    override readonly transient: boolean,
    readonly retryAfterMs?: number,
  ) {
    super(message);
  }
}

export class ConcurrentModificationError extends SubscriptionDomainError {
  readonly code = 'concurrent_modification';
  override readonly transient = true;
}

export class SubscriptionNotFoundError extends SubscriptionDomainError {
  readonly code = 'subscription_not_found';
}

export class SubscriptionConflictError extends SubscriptionDomainError {
  readonly code = 'subscription_conflict';
}

export class PlanNotFoundError extends SubscriptionDomainError {
  readonly code = 'plan_not_found';

  constructor(readonly planId: string) {
    super(`Plan ${planId} not found`);
  }
}

export class UnknownSubscriptionError extends SubscriptionDomainError {
  readonly code = 'unknown_subscription';
}

export const isDomainError = (
  error: unknown,
): error is SubscriptionDomainError => error instanceof SubscriptionDomainError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
