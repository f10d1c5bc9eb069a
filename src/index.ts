import * as path from 'path';
import { loadConfig } from './utils/validators';
import { createLogger, createTraceId, type Logger } from './utils/logger';
import type { AutomationConfig } from './types/AutomationConfig';
import { RateLimiter } from './limits/RateLimiter';
import { ConcurrencyLimiter } from './limits/ConcurrencyLimiter';
import { RequestGate } from './limits/RequestGate';
import { launchChromium } from './browser/PlaywrightDriver';
import { BrowserSessionManager, runWithSession } from './browser/SessionManager';
import { Authenticator, type Credentials } from './browser/Authenticator';
import { MessageParser } from './scrapers/messages/MessageParser';
import { MessageExtractor } from './scrapers/messages/MessageExtractor';
import { ListingParser } from './scrapers/listings/ListingParser';
import { ListingDetailParser } from './scrapers/listings/ListingDetailParser';
import { SearchQueryBuilder } from './scrapers/listings/SearchQueryBuilder';
import { ListingScraper } from './scrapers/listings/ListingScraper';
import { DataExporter } from './export/DataExporter';
import { RecordStore } from './database/RecordStore';
import { createSearchFilter } from './types/SearchFilter';

type Command = 'messages' | 'listings';

function parseCommand(value: string | undefined): Command | null {
  if (value === undefined || value === 'listings') {
    return 'listings';
  }
  return value === 'messages' ? 'messages' : null;
}

function credentialsFrom(config: AutomationConfig): Credentials | undefined {
  return config.email && config.password ? { email: config.email, password: config.password } : undefined;
}

/**
 * Builds the per-process request gate: one rate limiter and one
 * concurrency limiter shared by every session
 */
export function createRequestGate(config: AutomationConfig, logger: Logger): RequestGate {
  const rateLimiter = new RateLimiter(
    { requestsPerMinute: config.requestsPerMinute, burstSize: config.burstSize },
    logger
  );
  const concurrencyLimiter = new ConcurrencyLimiter(config.maxConcurrent, logger);
  return new RequestGate(rateLimiter, concurrencyLimiter, logger);
}

/**
 * Entry point: `messages` extracts inbox messages, `listings [keyword...]`
 * searches listings. Results are exported to the output directory.
 */
async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const command = parseCommand(argv[0]);
  if (!command) {
    console.error('Usage: portal-automation [listings [keyword...] | messages]');
    process.exitCode = 1;
    return;
  }

  let store: RecordStore | undefined;

  try {
    const config = loadConfig();
    const traceId = createTraceId();
    const logger = createLogger('portal-automation', traceId, config.logLevel);

    logger.info('Automation run starting', {
      command,
      baseUrl: config.baseUrl,
      headless: config.headless,
      requestsPerMinute: config.requestsPerMinute,
      maxConcurrent: config.maxConcurrent,
    });

    const gate = createRequestGate(config, logger);
    const session = new BrowserSessionManager(launchChromium, gate, logger, {
      headless: config.headless,
      sessionStatePath: config.sessionStatePath,
      defaultTimeoutMs: config.browserTimeoutMs,
      scrollPauseMs: config.scrollPauseMs,
      screenshotDir: path.join(config.outputDir, 'debug'),
    });
    store = config.databasePath ? new RecordStore(config.databasePath, logger) : undefined;
    const exporter = new DataExporter(config.outputDir, logger);
    const runStore = store;

    await runWithSession(session, async () => {
      const authenticator = new Authenticator(session, credentialsFrom(config), logger, {
        baseUrl: config.baseUrl,
      });
      const login = await authenticator.ensureAuthenticated();

      if (command === 'messages') {
        if (!login.success) {
          logger.error('Message extraction needs an authenticated session', { reason: login.message });
          process.exitCode = 1;
          return;
        }
        const extractor = new MessageExtractor(
          session,
          new MessageParser(logger),
          logger,
          { baseUrl: config.baseUrl },
          runStore
        );
        const result = await extractor.extractMessages({ limit: 100 });
        const files = await exporter.exportMessages(result.messages);

        console.log('\n=== Message Extraction ===');
        console.log(`Messages: ${result.messages.length}`);
        console.log(`Conversations processed: ${result.conversationsProcessed}`);
        console.log(`Conversations skipped: ${result.conversationsSkipped}`);
        console.log(`CSV: ${files.csv}`);
        console.log(`JSON: ${files.json}`);
        return;
      }

      if (!login.success) {
        logger.warn('Searching listings without an authenticated session', { reason: login.message });
      }
      const scraper = new ListingScraper(
        session,
        new ListingParser(logger),
        new ListingDetailParser(logger),
        new SearchQueryBuilder(config.baseUrl),
        logger,
        {},
        runStore
      );
      const filter = createSearchFilter({ keywords: argv.slice(1) });
      const result = await scraper.searchListings(filter, { limit: 50 });
      const files = await exporter.exportListings(result.listings);

      console.log('\n=== Listing Search ===');
      console.log(`Search URL: ${result.searchUrl}`);
      console.log(`Pages visited: ${result.pagesVisited}`);
      console.log(`Candidates: ${result.candidates} (skipped ${result.skipped})`);
      console.log(`Listings after filtering: ${result.listings.length}`);
      console.log(`CSV: ${files.csv}`);
      console.log(`JSON: ${files.json}`);
    });
  } catch (error) {
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  } finally {
    store?.close();
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}

export { main };
