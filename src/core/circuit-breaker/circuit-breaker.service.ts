import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { logger } from '../logger/logger.config';

export interface CircuitBreakerOptions {
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  volumeThreshold?: number;
}

export type CircuitState = 'open' | 'halfOpen' | 'closed';

export interface CircuitBreakerState {
  state: CircuitState;
  enabled: boolean;
  fires: number;
  failures: number;
  timeouts: number;
  rejects: number;
}

type BreakerTask = () => Promise<void>;

const runTask = (task: BreakerTask): Promise<void> => task();

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

/**
 * opossum rejects with ETIMEDOUT when the wrapped call exceeds its timeout
 */
export const isTimeoutError = (error: unknown): boolean =>
  errorCode(error) === 'ETIMEDOUT';

/**
 * opossum rejects with EOPENBREAKER (or ESHUTDOWN) without calling the action
 */
export const isBreakerRejection = (error: unknown): boolean => {
  const code = errorCode(error);
  return code === 'EOPENBREAKER' || code === 'ESHUTDOWN';
};

@Injectable()
export class CircuitBreakerService implements OnApplicationShutdown {
  private readonly logger = logger();
  private readonly breakers = new Map<string, CircuitBreaker<[BreakerTask], void>>();

  constructor(private readonly configService: ConfigService) {}

  /**
   * Runs `task` through the named breaker. Each external dependency (payment
   * provider, group API) gets one breaker so its health is tracked as a whole.
   */
  async execute<T>(
    name: string,
    task: () => Promise<T>,
    options?: CircuitBreakerOptions,
  ): Promise<T> {
    const breaker = this.getOrCreate(name, options);
    const holder: { outcome?: { value: T } } = {};

    await breaker.fire(async () => {
      holder.outcome = { value: await task() };
    });

    if (!holder.outcome) {
      throw new Error(`Circuit breaker ${name} resolved without a result`);
    }
    return holder.outcome.value;
  }

  getOrCreate(
    name: string,
    options?: CircuitBreakerOptions,
  ): CircuitBreaker<[BreakerTask], void> {
    const existing = this.breakers.get(name);
    if (existing) return existing;

    const breaker = new CircuitBreaker(runTask, {
      name,
      timeout:
        options?.timeout ??
        this.configService.get<number>('CIRCUIT_BREAKER_TIMEOUT', 10000),
      errorThresholdPercentage:
        options?.errorThresholdPercentage ??
        this.configService.get<number>('CIRCUIT_BREAKER_ERROR_THRESHOLD', 50),
      resetTimeout:
        options?.resetTimeout ??
        this.configService.get<number>('CIRCUIT_BREAKER_RESET_TIMEOUT', 30000),
      volumeThreshold: options?.volumeThreshold ?? 5,
    });

    breaker.on('open', () => {
      this.logger.warn(
        { circuitBreaker: name, state: 'open' },
        'Circuit breaker opened',
      );
    });

    breaker.on('halfOpen', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'halfOpen' },
        'Circuit breaker half-open',
      );
    });

    breaker.on('close', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'close' },
        'Circuit breaker closed',
      );
    });

    breaker.on('timeout', () => {
      this.logger.warn({ circuitBreaker: name }, 'Circuit breaker call timed out');
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  getCircuitBreakerState(name: string): CircuitBreakerState | null {
    const breaker = this.breakers.get(name);
    if (!breaker) return null;
    return this.describe(breaker);
  }

  getAllCircuitBreakersState(): Record<string, CircuitBreakerState> {
    const states: Record<string, CircuitBreakerState> = {};
    this.breakers.forEach((breaker, name) => {
      states[name] = this.describe(breaker);
    });
    return states;
  }

  isOpen(name: string): boolean {
    return this.getCircuitBreakerState(name)?.state === 'open';
  }

  onApplicationShutdown() {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }

  private describe(breaker: CircuitBreaker<[BreakerTask], void>): CircuitBreakerState {
    let state: CircuitState = 'closed';
    if (breaker.opened) {
      state = 'open';
    } else if (breaker.halfOpen) {
      state = 'halfOpen';
    }

    return {
      state,
      enabled: breaker.enabled,
      fires: breaker.stats.fires,
      failures: breaker.stats.failures,
      timeouts: breaker.stats.timeouts,
      rejects: breaker.stats.rejects,
    };
  }
}
