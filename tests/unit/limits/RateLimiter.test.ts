import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter } from '../../../src/limits/RateLimiter';
import { createSpyLogger, FakeClock } from '../../fixtures/testDoubles';

describe('RateLimiter', () => {
  let clock: FakeClock;
  let logger: ReturnType<typeof createSpyLogger>;

  beforeEach(() => {
    clock = new FakeClock();
    logger = createSpyLogger();
  });

  describe('constructor', () => {
    it('should default capacity to min(requestsPerMinute, 10) and start full', () => {
      const limiter = new RateLimiter({ requestsPerMinute: 30 }, logger, clock);

      expect(limiter.status()).toEqual({
        availableTokens: 10,
        capacity: 10,
        refillRatePerSecond: 0.5,
        requestsPerMinute: 30,
      });
    });

    it('should use the rate as capacity when it is below 10', () => {
      const limiter = new RateLimiter({ requestsPerMinute: 6 }, logger, clock);

      expect(limiter.status().capacity).toBe(6);
    });

    it('should honour an explicit burst size', () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, burstSize: 2 }, logger, clock);

      expect(limiter.status().capacity).toBe(2);
      expect(limiter.status().availableTokens).toBe(2);
    });

    it('should reject a non-positive rate', () => {
      expect(() => new RateLimiter({ requestsPerMinute: 0 }, logger, clock)).toThrow(RangeError);
    });
  });

  describe('acquire', () => {
    it('should admit a full burst without waiting', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60 }, logger, clock);

      for (let i = 0; i < 10; i++) {
        await limiter.acquire();
      }

      expect(clock.sleeps).toEqual([]);
      expect(limiter.status().availableTokens).toBe(0);
    });

    it('should wait for refill once the bucket is empty', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, burstSize: 1 }, logger, clock);

      await limiter.acquire();
      await limiter.acquire();

      // 1 token per second
      expect(clock.sleeps).toEqual([1000]);
      expect(limiter.status().availableTokens).toBe(0);
    });

    it('should sleep in bounded slices', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 30, burstSize: 1 }, logger, clock);

      await limiter.acquire();
      await limiter.acquire();

      // 0.5 tokens per second: 2000ms of waiting in 1000ms slices
      expect(clock.sleeps).toEqual([1000, 1000]);
    });

    it('should refill from elapsed time without exceeding capacity', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, burstSize: 5 }, logger, clock);

      await limiter.acquire(5);
      clock.advance(2000);
      expect(limiter.status().availableTokens).toBe(2);

      clock.advance(60_000);
      expect(limiter.status().availableTokens).toBe(5);
    });

    it('should ignore requests for zero tokens', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, burstSize: 3 }, logger, clock);

      await limiter.acquire(0);

      expect(limiter.status().availableTokens).toBe(3);
    });

    it('should ignore a request that is not a number', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, burstSize: 5 }, logger, clock);

      await limiter.acquire(NaN);
      clock.advance(10000);

      expect(limiter.status().availableTokens).toBe(5);
      expect(logger.warn).toHaveBeenCalledWith('Ignoring token request that is not a number', {
        requested: NaN,
      });
      await limiter.acquire(5);
      expect(limiter.status().availableTokens).toBe(0);
    });

    it('should clamp a request larger than the bucket and warn', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, burstSize: 3 }, logger, clock);

      await limiter.acquire(7);

      expect(limiter.status().availableTokens).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith('Requested tokens exceed bucket capacity, clamping', {
        requested: 7,
        capacity: 3,
      });
    });

    it('should not hand out the same token to concurrent callers', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, burstSize: 2 }, logger, clock);

      await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

      expect(clock.sleeps).toEqual([1000]);
      expect(limiter.status().availableTokens).toBe(0);
    });

    it('should keep the token count within [0, capacity] across mixed activity', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 120, burstSize: 4 }, logger, clock);
      const steps = [1, 3, 250, 2, 4, 900, 1, 1, 5000, 4, 2, 10, 3];

      for (const step of steps) {
        if (step > 10) {
          clock.advance(step);
        } else {
          await limiter.acquire(step);
        }
        const { availableTokens } = limiter.status();
        expect(availableTokens).toBeGreaterThanOrEqual(0);
        expect(availableTokens).toBeLessThanOrEqual(4);
      }
    });
  });
});
