/**
 * Barrel export for subscription domain interfaces
 */

export * from './group-manager.interface';
export * from './payment-gateway.interface';
export * from './subscription-store.interface';
