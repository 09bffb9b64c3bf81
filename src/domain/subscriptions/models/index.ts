/**
 * Barrel export for subscription domain models
 */

export * from './membership-intent.model';
export * from './payment-event.model';
export * from './plan.model';
export * from './subscription.model';
