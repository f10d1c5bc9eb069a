import { siteSelectors, siteUrl, type SitePaths } from '../../config/selectors';
import { WorkMode } from '../../types/ListingSummary';
import type { SearchFilter } from '../../types/SearchFilter';

const REMOTE_TYPE: Partial<Record<WorkMode, string>> = {
  [WorkMode.REMOTE]: 'work_from_home',
  [WorkMode.ON_SITE]: 'in_office',
};

/**
 * Builds the remote search URL for a filter.
 *
 * Only narrows the candidate set: stipend bounds, hybrid mode and the
 * posting window have no query parameter, and the local re-filter decides
 * what is returned.
 */
export class SearchQueryBuilder {
  private readonly baseUrl: string;
  private readonly paths: SitePaths;

  constructor(baseUrl: string, paths: SitePaths = siteSelectors.paths) {
    this.baseUrl = baseUrl;
    this.paths = paths;
  }

  build(filter: SearchFilter): string {
    const url = new URL(siteUrl(this.baseUrl, this.paths.internships));
    const params = url.searchParams;

    if (filter.keywords.length > 0) {
      params.set('keyword', filter.keywords.join(' '));
    }
    if (filter.locations.length > 0) {
      params.set('location', filter.locations.join(','));
    }
    const type = filter.workMode ? REMOTE_TYPE[filter.workMode] : undefined;
    if (type) {
      params.set('type', type);
    }
    if (filter.categories.length > 0) {
      params.set('category', filter.categories.join(','));
    }
    if (filter.companyTypes.length > 0) {
      params.set('company_type', filter.companyTypes.join(','));
    }
    if (filter.excludeUnpaid) {
      params.set('stipend_type', 'paid');
    }
    if (filter.maxDurationWeeks !== undefined) {
      params.set('duration', String(filter.maxDurationWeeks));
    }
    if (filter.partTimeAllowed) {
      params.set('part_time', '1');
    }
    if (filter.withJobOffer) {
      params.set('job_offer', '1');
    }

    return url.toString();
  }
}
