export * from './interfaces';
export * from './lifecycle/subscription-transitions';
export * from './models';
