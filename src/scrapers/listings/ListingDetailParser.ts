import type { Logger } from '../../utils/logger';
import { siteSelectors, type DetailSelectors } from '../../config/selectors';
import {
  extractField,
  extractOr,
  findContainers,
  listCandidates,
  loadDocument,
  textCandidates,
  type DomContext,
} from '../../extraction/FieldExtractor';
import { ExtractionError } from '../../types/errors';
import { createListingDetail, type ListingDetail } from '../../types/ListingDetail';
import type { ListingSummary } from '../../types/ListingSummary';
import { collapseWhitespace } from '../../utils/textCleaner';

/**
 * Parser for a listing's own page
 */
export class ListingDetailParser {
  private readonly logger: Logger;
  private readonly selectors: DetailSelectors;

  constructor(logger: Logger, selectors: DetailSelectors = siteSelectors.details) {
    this.logger = logger;
    this.selectors = selectors;
  }

  /**
   * Extends a summary with the fields of its detail page
   * @throws ExtractionError if the page has no detail section at all
   */
  parse(html: string, summary: ListingSummary): ListingDetail {
    const doc = loadDocument(html);
    if (findContainers(doc, this.selectors.ready).elements.length === 0) {
      throw new ExtractionError('description', `Detail page did not render for ${summary.url}`);
    }

    const openingsText = this.optionalText(doc, this.selectors.openings);
    const openingsMatch = openingsText?.match(/\d+/);

    const detail = createListingDetail(summary, {
      description: this.optionalText(doc, this.selectors.description) ?? '',
      responsibilities: extractOr(doc, listCandidates(this.selectors.responsibilities), []),
      skills: extractOr(doc, listCandidates(this.selectors.skills), []),
      perks: extractOr(doc, listCandidates(this.selectors.perks), []),
      openings: openingsMatch ? Number(openingsMatch[0]) : null,
      whoCanApply: this.optionalText(doc, this.selectors.whoCanApply),
      companyDescription: this.optionalText(doc, this.selectors.companyDescription),
    });

    this.logger.debug('Parsed listing detail', {
      id: summary.id,
      skills: detail.skills.length,
      perks: detail.perks.length,
    });
    return detail;
  }

  private optionalText(ctx: DomContext, selectors: readonly string[]): string | null {
    const result = extractField(ctx, textCandidates(selectors));
    return result.found ? collapseWhitespace(result.value) : null;
  }
}
