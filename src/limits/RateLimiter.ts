import type { Logger } from '../utils/logger';
import { Semaphore } from './Semaphore';

/**
 * Time source and sleeper, injectable so tests can drive the bucket
 * deterministically
 */
export interface Clock {
  now(): number; // milliseconds
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimiterConfig {
  requestsPerMinute: number;
  burstSize?: number; // Bucket capacity (default: min(requestsPerMinute, 10))
  maxWaitSliceMs?: number; // Longest single sleep while waiting (default: 1000)
}

export interface RateLimiterStatus {
  availableTokens: number;
  capacity: number;
  refillRatePerSecond: number;
  requestsPerMinute: number;
}

/**
 * Token-bucket admission control
 * Refill is lazy: tokens are recomputed from elapsed time whenever the bucket
 * is evaluated, there is no background timer.
 */
export class RateLimiter {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly capacity: number;
  private readonly refillRatePerSecond: number;
  private readonly requestsPerMinute: number;
  private readonly maxWaitSliceMs: number;
  private readonly mutex = new Semaphore(1);
  private tokens: number;
  private lastRefill: number;

  constructor(config: RateLimiterConfig, logger: Logger, clock: Clock = systemClock) {
    if (!(config.requestsPerMinute > 0)) {
      throw new RangeError('requestsPerMinute must be positive');
    }
    this.logger = logger;
    this.clock = clock;
    this.requestsPerMinute = config.requestsPerMinute;
    this.capacity = config.burstSize ?? Math.min(config.requestsPerMinute, 10);
    this.refillRatePerSecond = config.requestsPerMinute / 60;
    this.maxWaitSliceMs = config.maxWaitSliceMs ?? 1000;
    this.tokens = this.capacity;
    this.lastRefill = clock.now();

    this.logger.info('RateLimiter initialized', {
      requestsPerMinute: this.requestsPerMinute,
      capacity: this.capacity,
    });
  }

  /**
   * Waits until `n` tokens are available, then debits them.
   * Never throws; a request larger than the bucket is clamped to its capacity.
   * @param n - Tokens to take (default 1)
   */
  async acquire(n: number = 1): Promise<void> {
    if (Number.isNaN(n)) {
      this.logger.warn('Ignoring token request that is not a number', { requested: n });
      return;
    }
    if (n <= 0) {
      return;
    }
    let required = n;
    if (required > this.capacity) {
      this.logger.warn('Requested tokens exceed bucket capacity, clamping', {
        requested: n,
        capacity: this.capacity,
      });
      required = this.capacity;
    }

    await this.mutex.acquire();
    try {
      this.refill();
      while (this.tokens < required) {
        const waitMs = ((required - this.tokens) / this.refillRatePerSecond) * 1000;
        this.logger.debug('Rate limited, waiting for tokens', {
          required,
          available: Number(this.tokens.toFixed(3)),
          waitMs: Math.ceil(waitMs),
        });
        await this.clock.sleep(Math.min(Math.ceil(waitMs), this.maxWaitSliceMs));
        this.refill();
      }
      this.tokens -= required;
      this.logger.debug('Acquired tokens', {
        acquired: required,
        remaining: Number(this.tokens.toFixed(3)),
      });
    } finally {
      this.mutex.release();
    }
  }

  /**
   * Read-only snapshot of the bucket
   */
  status(): RateLimiterStatus {
    this.refill();
    return {
      availableTokens: this.tokens,
      capacity: this.capacity,
      refillRatePerSecond: this.refillRatePerSecond,
      requestsPerMinute: this.requestsPerMinute,
    };
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRatePerSecond);
    this.lastRefill = now;
  }
}
