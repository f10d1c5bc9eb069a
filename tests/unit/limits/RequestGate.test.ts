import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RateLimiter } from '../../../src/limits/RateLimiter';
import { ConcurrencyLimiter } from '../../../src/limits/ConcurrencyLimiter';
import { RequestGate } from '../../../src/limits/RequestGate';
import { createSpyLogger, FakeClock } from '../../fixtures/testDoubles';

describe('RequestGate', () => {
  let rateLimiter: RateLimiter;
  let concurrencyLimiter: ConcurrencyLimiter;
  let gate: RequestGate;

  beforeEach(() => {
    const logger = createSpyLogger();
    rateLimiter = new RateLimiter({ requestsPerMinute: 60, burstSize: 5 }, logger, new FakeClock());
    concurrencyLimiter = new ConcurrencyLimiter(1, logger);
    gate = new RequestGate(rateLimiter, concurrencyLimiter, logger);
  });

  it('should take a rate token before a concurrency slot', async () => {
    const order: string[] = [];
    const acquire = rateLimiter.acquire.bind(rateLimiter);
    const run = concurrencyLimiter.run.bind(concurrencyLimiter);
    vi.spyOn(rateLimiter, 'acquire').mockImplementation(async (n?: number) => {
      order.push('rate');
      return acquire(n);
    });
    vi.spyOn(concurrencyLimiter, 'run').mockImplementation(async <T>(operation: () => Promise<T>) => {
      order.push('concurrency');
      return run(operation);
    });

    const result = await gate.run('navigate', async () => {
      order.push('operation');
      return 42;
    });

    expect(result).toBe(42);
    expect(order).toEqual(['rate', 'concurrency', 'operation']);
  });

  it('should debit one token per operation', async () => {
    await gate.run('a', async () => undefined);
    await gate.run('b', async () => undefined);

    expect(gate.status().rate.availableTokens).toBe(3);
  });

  it('should propagate failures and free the concurrency slot', async () => {
    await expect(
      gate.run('click', async () => {
        throw new Error('element detached');
      })
    ).rejects.toThrow('element detached');

    expect(gate.status().concurrency).toEqual({ active: 0, available: 1, capacity: 1, waiting: 0 });
  });
});
