import { Injectable, Logger } from '@nestjs/common';
import CircuitBreaker from 'opossum';

export interface CircuitBreakerConfig {
  timeout: number;
  errorThreshold: number;
  resetTimeout: number;
  volumeThreshold: number;
}

export interface CircuitHealth {
  state: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
  stats: {
    failures: number;
    successes: number;
    rejects: number;
    timeouts: number;
    fires: number;
  };
}

interface BreakerView {
  readonly opened: boolean;
  readonly halfOpen: boolean;
  readonly stats: CircuitBreaker.Stats;
}

@Injectable()
export class CircuitBreakerFactory {
  private readonly logger = new Logger(CircuitBreakerFactory.name);
  private readonly breakers = new Map<string, BreakerView>();

  private readonly DEFAULT_CONFIG: CircuitBreakerConfig = {
    timeout: 15000,
    errorThreshold: 50,
    resetTimeout: 60000,
    volumeThreshold: 5,
  };

  createBreaker<TArgs extends unknown[], TResult>(
    name: string,
    action: (...args: TArgs) => Promise<TResult>,
    config?: Partial<CircuitBreakerConfig>,
  ): CircuitBreaker<TArgs, TResult> {
    const mergedConfig = { ...this.DEFAULT_CONFIG, ...config };

    const breaker = new CircuitBreaker<TArgs, TResult>(action, {
      timeout: mergedConfig.timeout,
      errorThresholdPercentage: mergedConfig.errorThreshold,
      resetTimeout: mergedConfig.resetTimeout,
      volumeThreshold: mergedConfig.volumeThreshold,
      // 4xx responses are the caller's problem, not the provider's health
      errorFilter: (error: unknown) => {
        const status = statusCodeOf(error);
        return status !== undefined && status >= 400 && status < 500;
      },
    });

    breaker.on('open', () => {
      this.logger.error(`[OPEN] Circuit breaker OPEN for ${name}`);
    });
    breaker.on('halfOpen', () => {
      this.logger.warn(`[HALF-OPEN] Circuit breaker HALF-OPEN for ${name}`);
    });
    breaker.on('close', () => {
      this.logger.log(`[CLOSED] Circuit breaker CLOSED for ${name}`);
    });
    breaker.on('timeout', () => {
      this.logger.warn(`Circuit breaker timeout for ${name}`);
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  health(): Record<string, CircuitHealth> {
    const health: Record<string, CircuitHealth> = {};
    this.breakers.forEach((breaker, name) => {
      const stats = breaker.stats;
      health[name] = {
        state: breaker.opened
          ? 'OPEN'
          : breaker.halfOpen
            ? 'HALF_OPEN'
            : 'CLOSED',
        stats: {
          failures: stats.failures,
          successes: stats.successes,
          rejects: stats.rejects,
          timeouts: stats.timeouts,
          fires: stats.fires,
        },
      };
    });
    return health;
  }
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}
