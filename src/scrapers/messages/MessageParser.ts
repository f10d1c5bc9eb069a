import type { Element } from 'domhandler';
import type { Logger } from '../../utils/logger';
import { siteSelectors, type MessageSelectors } from '../../config/selectors';
import {
  allAttr,
  attrAt,
  contextFor,
  extractField,
  extractOr,
  findContainers,
  loadDocument,
  ownText,
  textCandidates,
  type DomContext,
} from '../../extraction/FieldExtractor';
import { classifyDirection } from '../../extraction/directionClassifier';
import { createMessage, MessageDirection, type Message } from '../../types/Message';
import { parseMessageTimestamp } from '../../utils/dateParser';

/**
 * A conversation thread as listed on the inbox page
 */
export interface ThreadRef {
  index: number;
  href?: string;
  /** Selector the thread list was found with, used to click threads without links */
  selector: string;
  label: string;
}

export interface ThreadParseOptions {
  includeSent: boolean;
  includeReceived: boolean;
  now: Date;
}

const DEFAULT_SENDER: Record<MessageDirection, string> = {
  [MessageDirection.SENT]: 'You',
  [MessageDirection.RECEIVED]: 'Company Representative',
};

/**
 * Parses the inbox and conversation pages into thread references and
 * message records
 */
export class MessageParser {
  private readonly logger: Logger;
  private readonly selectors: MessageSelectors;

  constructor(logger: Logger, selectors: MessageSelectors = siteSelectors.messages) {
    this.logger = logger;
    this.selectors = selectors;
  }

  listThreads(html: string): ThreadRef[] {
    const doc = loadDocument(html);
    const { elements, selector } = findContainers(doc, this.selectors.threads);
    if (!selector) {
      this.logger.warn('No conversation threads found');
      return [];
    }

    this.logger.info('Found conversation threads', { count: elements.length, selector });

    return elements.map((element, index) => {
      const ctx = contextFor(doc.$, element);
      const href = extractField(ctx, [
        ({ root }: DomContext) => root.attr('href')?.trim() || root.attr('data-href')?.trim() || undefined,
        ...this.selectors.threadLink.map((linkSelector) => attrAt(linkSelector, 'href')),
      ]);
      return {
        index,
        href: href.found ? href.value : undefined,
        selector,
        label: ctx.root.text().replace(/\s+/g, ' ').trim().slice(0, 80),
      };
    });
  }

  /**
   * Extracts the messages of an opened conversation. Messages filtered out by
   * direction or without content are left out; a message that fails to
   * build is logged and skipped.
   */
  parseThread(html: string, sourceUrl: string, options: ThreadParseOptions): Message[] {
    const doc = loadDocument(html);
    const { elements } = findContainers(doc, this.selectors.items);
    if (elements.length === 0) {
      this.logger.debug('No messages found in conversation', { sourceUrl });
      return [];
    }

    const messages: Message[] = [];
    for (const element of elements) {
      try {
        const message = this.parseMessage(contextFor(doc.$, element), element, sourceUrl, options);
        if (message) {
          messages.push(message);
        }
      } catch (error) {
        this.logger.warn('Failed to parse message', {
          sourceUrl,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return messages;
  }

  private parseMessage(
    ctx: DomContext,
    element: Element,
    sourceUrl: string,
    options: ThreadParseOptions
  ): Message | null {
    const parentClass = element.parent && 'attribs' in element.parent ? element.parent.attribs.class : undefined;
    const direction = classifyDirection(ctx.root.attr('class'), parentClass);

    if (direction === MessageDirection.SENT && !options.includeSent) {
      return null;
    }
    if (direction === MessageDirection.RECEIVED && !options.includeReceived) {
      return null;
    }

    const content = extractOr(ctx, [...textCandidates(this.selectors.content), ownText()], '');
    if (!content) {
      return null;
    }

    const sender = extractOr(ctx, textCandidates(this.selectors.sender), DEFAULT_SENDER[direction]);

    const timestampText = extractField(ctx, textCandidates(this.selectors.timestamp));
    const timestamp = timestampText.found
      ? parseMessageTimestamp(timestampText.value, options.now)
      : options.now;

    const attachments = extractOr(
      ctx,
      this.selectors.attachments.map((selector) => allAttr(selector, 'href')),
      []
    );

    return createMessage({
      sender,
      direction,
      timestamp,
      rawText: content,
      attachments: attachments.map((href) => this.resolve(href, sourceUrl)),
      sourceUrl,
    });
  }

  private resolve(href: string, pageUrl: string): string {
    try {
      return new URL(href, pageUrl).toString();
    } catch {
      return href;
    }
  }
}
