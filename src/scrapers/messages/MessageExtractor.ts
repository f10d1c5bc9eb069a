import type { BrowserSessionManager } from '../../browser/SessionManager';
import type { RecordStore } from '../../database/RecordStore';
import type { Logger } from '../../utils/logger';
import { BaseScraper, collectBatch } from '../base/BaseScraper';
import type { MessageParser, ThreadRef } from './MessageParser';
import { siteSelectors, siteUrl, type MessageSelectors, type SitePaths } from '../../config/selectors';
import { ExtractionError } from '../../types/errors';
import type { Message } from '../../types/Message';
import { isWithinDays } from '../../utils/dateParser';

/**
 * Message extraction options
 */
export interface MessageQuery {
  limit?: number; // Maximum messages to return (default: 100)
  includeSent?: boolean; // default: true
  includeReceived?: boolean; // default: true
  sinceDays?: number;
  keyword?: string;
}

/**
 * Messages plus how many conversations were attempted and skipped
 */
export interface MessageExtractionResult {
  messages: Message[];
  conversationsProcessed: number;
  conversationsSkipped: number;
}

export interface MessageExtractorOptions {
  baseUrl: string;
  selectors?: MessageSelectors;
  paths?: SitePaths;
  pageTimeoutMs?: number; // wait for the inbox to render (default: 15000)
  threadTimeoutMs?: number; // wait for an opened conversation (default: 10000)
  now?: () => Date;
}

/**
 * Walks conversation threads in the inbox and extracts their messages
 */
export class MessageExtractor extends BaseScraper {
  private readonly parser: MessageParser;
  private readonly baseUrl: string;
  private readonly selectors: MessageSelectors;
  private readonly paths: SitePaths;
  private readonly pageTimeoutMs: number;
  private readonly threadTimeoutMs: number;
  private readonly now: () => Date;

  constructor(
    session: BrowserSessionManager,
    parser: MessageParser,
    logger: Logger,
    options: MessageExtractorOptions,
    store?: RecordStore
  ) {
    super(session, logger, store);
    this.parser = parser;
    this.baseUrl = options.baseUrl;
    this.selectors = options.selectors ?? siteSelectors.messages;
    this.paths = options.paths ?? siteSelectors.paths;
    this.pageTimeoutMs = options.pageTimeoutMs ?? 15000;
    this.threadTimeoutMs = options.threadTimeoutMs ?? 10000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Extracts up to `limit` matching messages. Every filter applies per
   * message while walking threads, so the limit counts matches only.
   * A conversation that cannot be opened or read is logged and skipped.
   * @throws SessionUnavailableError when the browser itself is unusable
   */
  async extractMessages(query: MessageQuery = {}): Promise<MessageExtractionResult> {
    const limit = query.limit ?? 100;
    const includeSent = query.includeSent ?? true;
    const includeReceived = query.includeReceived ?? true;
    const now = this.now();
    const runId = this.store?.startRun('messages');

    this.logger.info('Starting message extraction', {
      limit,
      includeSent,
      includeReceived,
      sinceDays: query.sinceDays,
      keyword: query.keyword,
    });

    try {
      const inboxUrl = siteUrl(this.baseUrl, this.paths.messages);
      await this.session.navigate(inboxUrl);
      if (!(await this.waitForAny(this.selectors.pageReady, this.pageTimeoutMs))) {
        this.logger.warn('Messages page not found or not loaded', { url: inboxUrl });
        const empty = { messages: [], conversationsProcessed: 0, conversationsSkipped: 0 };
        if (runId !== undefined) {
          this.store?.completeRun(runId, { processed: 0, extracted: 0, skipped: 0 });
        }
        return empty;
      }

      const threads = this.parser.listThreads(await this.session.pageContent());

      const batch = await collectBatch(this.logger, 'conversation', threads, limit, async (thread) => {
        const extracted = await this.readThread(thread, inboxUrl, { includeSent, includeReceived, now });
        const matching = extracted.filter((message) => this.matchesQuery(message, query, now));
        this.logger.debug('Extracted conversation', {
          index: thread.index,
          messages: extracted.length,
          matching: matching.length,
        });
        return matching;
      });

      const messages = batch.items;
      this.store?.insertMessages(messages);
      if (runId !== undefined) {
        this.store?.completeRun(runId, {
          processed: batch.processed,
          extracted: messages.length,
          skipped: batch.skipped,
        });
      }

      this.logger.info('Message extraction complete', {
        messages: messages.length,
        conversationsProcessed: batch.processed,
        conversationsSkipped: batch.skipped,
      });

      return {
        messages,
        conversationsProcessed: batch.processed,
        conversationsSkipped: batch.skipped,
      };
    } catch (error) {
      if (runId !== undefined) {
        this.store?.failRun(runId, error instanceof Error ? error.message : String(error));
      }
      throw error;
    }
  }

  private async readThread(
    thread: ThreadRef,
    inboxUrl: string,
    options: { includeSent: boolean; includeReceived: boolean; now: Date }
  ): Promise<Message[]> {
    const href = thread.href ? this.absoluteUrl(thread.href, inboxUrl) : null;
    const opened = href
      ? await this.session.navigate(href)
      : await this.openByClick(thread, inboxUrl);
    if (!opened) {
      throw new ExtractionError('conversation', `Could not open conversation ${thread.index + 1}`);
    }

    await this.waitForAny(this.selectors.threadOpened, this.threadTimeoutMs);
    const html = await this.session.pageContent();
    return this.parser.parseThread(html, this.session.currentUrl(), options);
  }

  /**
   * Threads without a link are opened by clicking the n-th list entry; the
   * inbox is reloaded first when an earlier thread navigated away from it
   */
  private async openByClick(thread: ThreadRef, inboxUrl: string): Promise<boolean> {
    if (this.session.currentUrl() !== inboxUrl) {
      await this.session.navigate(inboxUrl);
    }
    return this.session.click(`:nth-match(${thread.selector}, ${thread.index + 1})`);
  }

  private matchesQuery(message: Message, query: MessageQuery, now: Date): boolean {
    if (query.sinceDays !== undefined && !isWithinDays(message.timestamp, query.sinceDays, now)) {
      return false;
    }
    const keyword = query.keyword?.trim().toLowerCase();
    return !keyword || message.cleanedText.toLowerCase().includes(keyword);
  }
}
