import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { Logger } from '../../utils/logger';
import { siteSelectors, type ListingSelectors } from '../../config/selectors';
import {
  attrAt,
  contextFor,
  exists,
  extractField,
  extractOr,
  findContainers,
  listCandidates,
  loadDocument,
  textCandidates,
  type DomContext,
  type ExtractionStrategy,
} from '../../extraction/FieldExtractor';
import { ExtractionError } from '../../types/errors';
import { createListingSummary, WorkMode, type ListingSummary } from '../../types/ListingSummary';
import { normalizeDuration, parseSiteDate } from '../../utils/dateParser';
import { collapseWhitespace } from '../../utils/textCleaner';

/**
 * Infers the work mode from a card's location line and full text
 */
export function inferWorkMode(location: string, cardText: string = ''): WorkMode {
  const text = `${location} ${cardText}`.toLowerCase();
  if (/\bhybrid\b/.test(text)) {
    return WorkMode.HYBRID;
  }
  if (/work from home|\bremote\b|\bwfh\b/.test(text)) {
    return WorkMode.REMOTE;
  }
  return WorkMode.ON_SITE;
}

/**
 * Parser for search result cards
 */
export class ListingParser {
  private readonly logger: Logger;
  private readonly selectors: ListingSelectors;
  private readonly linkStrategies: ExtractionStrategy<string>[];

  constructor(logger: Logger, selectors: ListingSelectors = siteSelectors.listings) {
    this.logger = logger;
    this.selectors = selectors;
    this.linkStrategies = [
      ...selectors.link.flatMap((selector) =>
        selectors.linkAttributes.map((attribute) => attrAt(selector, attribute))
      ),
      // Cards often carry the detail link on the container itself
      ...selectors.linkAttributes.map(
        (attribute): ExtractionStrategy<string> =>
          ({ root }) => root.attr(attribute)?.trim() || undefined
      ),
    ];
  }

  /**
   * Locates the result cards on a search page, using the first card
   * selector that matches
   */
  findCards(html: string): { $: CheerioAPI; cards: Element[] } {
    const doc = loadDocument(html);
    const { elements, selector } = findContainers(doc, this.selectors.cards);
    if (selector) {
      this.logger.info('Found listing cards', { count: elements.length, selector });
    } else {
      this.logger.info('No listing cards found on page');
    }
    return { $: doc.$, cards: elements };
  }

  /**
   * Builds a listing from one card. Optional fields fall back to empty
   * values; a card without a title is not a listing.
   * @throws ExtractionError when the title cannot be extracted
   */
  parseCard($: CheerioAPI, card: Element, pageUrl: string, now: Date): ListingSummary {
    const ctx = contextFor($, card);

    const title = extractField(ctx, textCandidates(this.selectors.title));
    if (!title.found) {
      throw new ExtractionError('title');
    }

    const location = this.text(ctx, this.selectors.location);
    const href = extractField(ctx, this.linkStrategies);
    const postedText = this.text(ctx, this.selectors.posted);
    const applyByText = this.text(ctx, this.selectors.applyBy);

    return createListingSummary({
      title: collapseWhitespace(title.value),
      company: this.text(ctx, this.selectors.company),
      location,
      mode: inferWorkMode(location, ctx.root.text()),
      stipendText: this.text(ctx, this.selectors.stipend),
      duration: normalizeDuration(this.text(ctx, this.selectors.duration)),
      postedDate: postedText ? parseSiteDate(postedText, now) : null,
      applyBy: applyByText ? parseSiteDate(applyByText, now) : null,
      url: (href.found && this.resolve(href.value, pageUrl)) || '',
      isStartup: extractOr(ctx, this.selectors.startupBadge.map(exists), false),
      tags: extractOr(ctx, listCandidates(this.selectors.tags), []),
    });
  }

  /**
   * Follows the "next page" control, if the page has one
   */
  nextPageUrl(html: string, pageUrl: string): string | null {
    const doc = loadDocument(html);
    const href = extractField(
      doc,
      this.selectors.nextPage.map((selector) => attrAt(selector, 'href'))
    );
    if (!href.found || href.value.startsWith('javascript:') || href.value === '#') {
      return null;
    }
    return this.resolve(href.value, pageUrl);
  }

  private text(ctx: DomContext, selectors: readonly string[]): string {
    return collapseWhitespace(extractOr(ctx, textCandidates(selectors), ''));
  }

  private resolve(href: string, pageUrl: string): string | null {
    try {
      return new URL(href, pageUrl).toString();
    } catch (error) {
      this.logger.debug('Ignoring malformed link', {
        href,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
