export const SUBSCRIPTION_STORE = 'SUBSCRIPTION_STORE';
