export * from './membership-intent.entity';
export * from './payment-event.entity';
export * from './plan.entity';
export * from './subscription.entity';
