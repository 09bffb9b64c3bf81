import { validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
  it('should fill defaults for a minimal environment', () => {
    const config = validateEnvironment({});

    expect(config).toMatchObject({
      STORE_DRIVER: 'postgres',
      PAYMENT_PROVIDER: 'simulation',
      GROUP_MANAGER: 'logging',
      GRACE_PERIOD_DAYS: 2,
      MEMBERSHIP_SYNC_MAX_ATTEMPTS: 8,
      MEMBERSHIP_SYNC_ON_COMMIT: true,
      DEFAULT_PLAN_AMOUNT_MINOR: 999,
    });
  });

  it('should coerce numbers and booleans from env strings', () => {
    const config = validateEnvironment({
      GRACE_PERIOD_DAYS: '5',
      MEMBERSHIP_SYNC_ON_COMMIT: 'false',
      PORT: '8080',
    });

    expect(config.GRACE_PERIOD_DAYS).toBe(5);
    expect(config.MEMBERSHIP_SYNC_ON_COMMIT).toBe(false);
    expect(config.PORT).toBe(8080);
  });

  it('should fail fast on unknown drivers and out-of-range values', () => {
    expect(() => validateEnvironment({ PAYMENT_PROVIDER: 'paypal' })).toThrow(
      'Invalid environment configuration',
    );
    expect(() => validateEnvironment({ DB_LOCK_TIMEOUT_MS: '10' })).toThrow(
      'DB_LOCK_TIMEOUT_MS must not be less than 100',
    );
  });
});
