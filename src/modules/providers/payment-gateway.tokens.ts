export const PAYMENT_GATEWAY = 'PAYMENT_GATEWAY';
