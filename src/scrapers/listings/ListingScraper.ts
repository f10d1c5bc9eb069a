import type { BrowserSessionManager } from '../../browser/SessionManager';
import type { RecordStore } from '../../database/RecordStore';
import type { Logger } from '../../utils/logger';
import { BaseScraper, collectBatch } from '../base/BaseScraper';
import type { ListingParser } from './ListingParser';
import type { ListingDetailParser } from './ListingDetailParser';
import type { SearchQueryBuilder } from './SearchQueryBuilder';
import { filterListings } from './ListingFilter';
import { siteSelectors, type DetailSelectors, type ListingSelectors } from '../../config/selectors';
import { SessionUnavailableError } from '../../types/errors';
import type { ListingDetail } from '../../types/ListingDetail';
import type { ListingSummary } from '../../types/ListingSummary';
import type { SearchFilter } from '../../types/SearchFilter';

/**
 * Listing search options
 */
export interface ListingSearchOptions {
  limit?: number; // Maximum candidates to collect before filtering (default: 100)
  maxPages?: number; // Result pages to visit (default: 5)
  extractDetails?: boolean;
  maxDetailPages?: number; // default: 20
}

export interface ListingSearchResult {
  listings: Array<ListingSummary | ListingDetail>;
  searchUrl: string;
  pagesVisited: number;
  candidates: number;
  processed: number;
  skipped: number;
}

export interface ListingScraperOptions {
  selectors?: ListingSelectors;
  detailSelectors?: DetailSelectors;
  resultsTimeoutMs?: number; // wait for result cards (default: 15000)
  detailTimeoutMs?: number; // wait for a detail page (default: 10000)
  now?: () => Date;
}

/**
 * Two-phase listing search: the remote query narrows the candidates, the
 * local re-filter decides what is returned
 */
export class ListingScraper extends BaseScraper {
  private readonly parser: ListingParser;
  private readonly detailParser: ListingDetailParser;
  private readonly queryBuilder: SearchQueryBuilder;
  private readonly selectors: ListingSelectors;
  private readonly detailSelectors: DetailSelectors;
  private readonly resultsTimeoutMs: number;
  private readonly detailTimeoutMs: number;
  private readonly now: () => Date;

  constructor(
    session: BrowserSessionManager,
    parser: ListingParser,
    detailParser: ListingDetailParser,
    queryBuilder: SearchQueryBuilder,
    logger: Logger,
    options: ListingScraperOptions = {},
    store?: RecordStore
  ) {
    super(session, logger, store);
    this.parser = parser;
    this.detailParser = detailParser;
    this.queryBuilder = queryBuilder;
    this.selectors = options.selectors ?? siteSelectors.listings;
    this.detailSelectors = options.detailSelectors ?? siteSelectors.details;
    this.resultsTimeoutMs = options.resultsTimeoutMs ?? 15000;
    this.detailTimeoutMs = options.detailTimeoutMs ?? 10000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Searches listings matching `filter`
   * @throws SessionUnavailableError when the browser itself is unusable
   */
  async searchListings(filter: SearchFilter, options: ListingSearchOptions = {}): Promise<ListingSearchResult> {
    const limit = options.limit ?? 100;
    const maxPages = options.maxPages ?? 5;
    const now = this.now();
    const searchUrl = this.queryBuilder.build(filter);
    const runId = this.store?.startRun('listings');

    this.logger.info('Starting listing search', { searchUrl, limit, maxPages });

    try {
      const candidates: ListingSummary[] = [];
      const seenIds = new Set<string>();
      const visitedPages = new Set<string>();
      let processed = 0;
      let skipped = 0;
      let pageUrl: string | null = searchUrl;

      while (pageUrl && visitedPages.size < maxPages && candidates.length < limit) {
        if (visitedPages.has(pageUrl)) {
          this.logger.warn('Already visited this results page, stopping', { url: pageUrl });
          break;
        }
        visitedPages.add(pageUrl);

        await this.session.navigate(pageUrl);
        if (!(await this.waitForAny(this.selectors.resultsReady, this.resultsTimeoutMs))) {
          this.logger.warn('Search results not loaded', { url: pageUrl, page: visitedPages.size });
          break;
        }
        await this.session.scrollToEnd();

        const html = await this.session.pageContent();
        const { $, cards } = this.parser.findCards(html);
        const currentUrl: string = pageUrl;
        const batch = await collectBatch(
          this.logger,
          'listing card',
          cards,
          limit - candidates.length,
          (card) => [this.parser.parseCard($, card, currentUrl, now)]
        );
        processed += batch.processed;
        skipped += batch.skipped;

        for (const listing of batch.items) {
          if (!seenIds.has(listing.id)) {
            seenIds.add(listing.id);
            candidates.push(listing);
          }
        }

        this.logger.info(`Collected results page ${visitedPages.size}`, {
          url: pageUrl,
          candidates: candidates.length,
        });

        pageUrl = this.parser.nextPageUrl(html, pageUrl);
        if (!pageUrl) {
          this.logger.info('No further results pages');
        }
      }

      const filtered = filterListings(candidates, filter, now, this.logger);
      const listings = options.extractDetails
        ? await this.withDetails(filtered, options.maxDetailPages ?? 20)
        : filtered;

      this.store?.upsertListings(listings);
      if (runId !== undefined) {
        this.store?.completeRun(runId, { processed, extracted: listings.length, skipped });
      }

      this.logger.info('Listing search complete', {
        pagesVisited: visitedPages.size,
        candidates: candidates.length,
        listings: listings.length,
        skipped,
      });

      return {
        listings,
        searchUrl,
        pagesVisited: visitedPages.size,
        candidates: candidates.length,
        processed,
        skipped,
      };
    } catch (error) {
      if (runId !== undefined) {
        this.store?.failRun(runId, error instanceof Error ? error.message : String(error));
      }
      throw error;
    }
  }

  /**
   * Visits up to `maxDetailPages` listing pages. A listing whose page cannot
   * be read keeps its summary.
   */
  private async withDetails(
    listings: ListingSummary[],
    maxDetailPages: number
  ): Promise<Array<ListingSummary | ListingDetail>> {
    const results: Array<ListingSummary | ListingDetail> = [];
    let visited = 0;

    for (const listing of listings) {
      if (visited >= maxDetailPages || !listing.url) {
        results.push(listing);
        continue;
      }
      visited++;
      try {
        await this.session.navigate(listing.url);
        await this.waitForAny(this.detailSelectors.ready, this.detailTimeoutMs);
        results.push(this.detailParser.parse(await this.session.pageContent(), listing));
      } catch (error) {
        if (error instanceof SessionUnavailableError) {
          throw error;
        }
        this.logger.warn('Failed to extract listing detail, keeping summary', {
          id: listing.id,
          url: listing.url,
          error: error instanceof Error ? error.message : String(error),
        });
        results.push(listing);
      }
    }

    this.logger.info('Detail extraction complete', { visited, listings: listings.length });
    return results;
  }
}
