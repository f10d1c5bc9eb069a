import type { BrowserSessionManager } from '../../browser/SessionManager';
import type { RecordStore } from '../../database/RecordStore';
import type { Logger } from '../../utils/logger';
import { SessionUnavailableError } from '../../types/errors';

/**
 * Result of a batch extraction: whatever could be extracted plus counts of
 * attempted and skipped source items
 */
export interface BatchOutcome<T> {
  items: T[];
  processed: number;
  skipped: number;
}

/**
 * Runs `extractOne` over `sources` until `limit` items are collected.
 *
 * A source that throws is logged once and counted as skipped; the batch
 * carries on. SessionUnavailableError is the exception: the browser is gone,
 * so it propagates.
 *
 * @param label - Noun used in log lines ("listing card", "conversation")
 * @param extractOne - Returns zero or more items for one source
 */
export async function collectBatch<S, T>(
  logger: Logger,
  label: string,
  sources: readonly S[],
  limit: number,
  extractOne: (source: S, index: number) => Promise<T[]> | T[]
): Promise<BatchOutcome<T>> {
  const items: T[] = [];
  let processed = 0;
  let skipped = 0;

  for (let index = 0; index < sources.length; index++) {
    if (items.length >= limit) {
      break;
    }
    processed++;
    try {
      const extracted = await extractOne(sources[index], index);
      items.push(...extracted);
    } catch (error) {
      if (error instanceof SessionUnavailableError) {
        throw error;
      }
      skipped++;
      logger.warn(`Skipped ${label}`, {
        index,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const limited = items.length > limit ? items.slice(0, limit) : items;
  logger.info(`Processed ${label} batch`, {
    processed,
    extracted: limited.length,
    skipped,
    available: sources.length,
  });

  return { items: limited, processed, skipped };
}

/**
 * Abstract base for the orchestrators that drive one session and extract
 * records from the pages it loads
 */
export abstract class BaseScraper {
  protected readonly session: BrowserSessionManager;
  protected readonly logger: Logger;
  protected readonly store?: RecordStore;

  /**
   * @param store - Optional record store for incremental saving
   */
  constructor(session: BrowserSessionManager, logger: Logger, store?: RecordStore) {
    this.session = session;
    this.logger = logger;
    this.store = store;
  }

  /**
   * Waits for any of the candidate selectors to appear
   */
  protected async waitForAny(selectors: readonly string[], timeoutMs: number): Promise<boolean> {
    return this.session.waitFor(selectors.join(', '), timeoutMs);
  }

  protected absoluteUrl(href: string, pageUrl: string): string | null {
    try {
      return new URL(href, pageUrl).toString();
    } catch (error) {
      this.logger.debug('Ignoring malformed URL', {
        href,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
