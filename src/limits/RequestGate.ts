import type { Logger } from '../utils/logger';
import type { RateLimiter, RateLimiterStatus } from './RateLimiter';
import type { ConcurrencyLimiter, ConcurrencyStatus } from './ConcurrencyLimiter';

/**
 * Admission for every remote-facing operation. The rate limiter paces
 * arrival first, the concurrency limiter then bounds simultaneity; release
 * happens in reverse order when the operation settles.
 *
 * One gate is built per process and shared by every session manager, so
 * aggregate request volume stays bounded however many sessions run.
 */
export class RequestGate {
  private readonly rateLimiter: RateLimiter;
  private readonly concurrencyLimiter: ConcurrencyLimiter;
  private readonly logger: Logger;

  constructor(rateLimiter: RateLimiter, concurrencyLimiter: ConcurrencyLimiter, logger: Logger) {
    this.rateLimiter = rateLimiter;
    this.concurrencyLimiter = concurrencyLimiter;
    this.logger = logger;
  }

  async run<T>(operationName: string, operation: () => Promise<T>): Promise<T> {
    this.logger.debug('Starting rate-limited operation', { operation: operationName });
    await this.rateLimiter.acquire();
    try {
      return await this.concurrencyLimiter.run(operation);
    } finally {
      this.logger.debug('Completed rate-limited operation', { operation: operationName });
    }
  }

  status(): { rate: RateLimiterStatus; concurrency: ConcurrencyStatus } {
    return {
      rate: this.rateLimiter.status(),
      concurrency: this.concurrencyLimiter.status(),
    };
  }
}
