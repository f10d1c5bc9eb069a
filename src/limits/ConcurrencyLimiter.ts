import type { Logger } from '../utils/logger';
import { Semaphore } from './Semaphore';

export interface ConcurrencyStatus {
  active: number;
  available: number;
  capacity: number;
  waiting: number;
}

/**
 * Bounded-slot admission control for simultaneous in-flight operations
 */
export class ConcurrencyLimiter {
  private readonly logger: Logger;
  private readonly capacity: number;
  private readonly semaphore: Semaphore;
  private active = 0;

  constructor(capacity: number, logger: Logger) {
    this.capacity = capacity;
    this.semaphore = new Semaphore(capacity);
    this.logger = logger;

    this.logger.info('ConcurrencyLimiter initialized', { capacity });
  }

  /**
   * Runs `operation` while holding a slot. The slot is released on every exit
   * path, including a rejected operation.
   */
  async run<T>(operation: () => Promise<T>): Promise<T> {
    await this.semaphore.acquire();
    this.active++;
    this.logger.debug('Acquired concurrency slot', { active: this.active });
    try {
      return await operation();
    } finally {
      this.active--;
      this.semaphore.release();
      this.logger.debug('Released concurrency slot', { active: this.active });
    }
  }

  status(): ConcurrencyStatus {
    return {
      active: this.active,
      available: this.capacity - this.active,
      capacity: this.capacity,
      waiting: this.semaphore.waiting,
    };
  }
}
