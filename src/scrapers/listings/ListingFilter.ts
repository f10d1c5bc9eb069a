import type { Logger } from '../../utils/logger';
import type { ListingSummary } from '../../types/ListingSummary';
import { CompanyType, type SearchFilter } from '../../types/SearchFilter';
import { durationInWeeks, isWithinDays } from '../../utils/dateParser';

function hasLabel(listing: ListingSummary, label: string): boolean {
  return listing.tags.some((tag) => tag.toLowerCase().replace(/-/g, ' ').includes(label));
}

/**
 * Returns the first constraint `listing` violates, or null when it passes.
 *
 * This is the authoritative check: a listing whose value for a constrained
 * field is unknown (no stipend bounds, no posting date) does not pass that
 * constraint.
 */
export function rejectionReason(listing: ListingSummary, filter: SearchFilter, now: Date): string | null {
  if (filter.keywords.length > 0) {
    const haystack = [listing.title, listing.company, ...listing.tags].join(' ').toLowerCase();
    if (!filter.keywords.some((keyword) => haystack.includes(keyword.toLowerCase()))) {
      return 'keyword';
    }
  }

  if (filter.locations.length > 0) {
    const location = listing.location.toLowerCase();
    if (!filter.locations.some((wanted) => location.includes(wanted.toLowerCase()))) {
      return 'location';
    }
  }

  if (filter.minStipend !== undefined) {
    if (listing.stipendMin === null || listing.stipendMin < filter.minStipend) {
      return 'minStipend';
    }
  }

  if (filter.maxStipend !== undefined) {
    if (listing.stipendMax === null || listing.stipendMax > filter.maxStipend) {
      return 'maxStipend';
    }
  }

  if (filter.excludeUnpaid && (listing.stipendMax === null || listing.stipendMax <= 0)) {
    return 'unpaid';
  }

  if (filter.workMode !== undefined && listing.mode !== filter.workMode) {
    return 'workMode';
  }

  if (filter.categories.length > 0) {
    const haystack = [listing.title, ...listing.tags].join(' ').toLowerCase();
    if (!filter.categories.some((category) => haystack.includes(category.toLowerCase()))) {
      return 'category';
    }
  }

  if (filter.companyTypes.length > 0) {
    const wanted = listing.isStartup ? CompanyType.STARTUP : CompanyType.ESTABLISHED;
    if (!filter.companyTypes.includes(wanted)) {
      return 'companyType';
    }
  }

  if (filter.postedWithinDays !== undefined) {
    if (listing.postedDate === null || !isWithinDays(listing.postedDate, filter.postedWithinDays, now)) {
      return 'postedWithinDays';
    }
  }

  if (filter.maxDurationWeeks !== undefined) {
    const weeks = durationInWeeks(listing.duration);
    if (weeks === null || weeks > filter.maxDurationWeeks) {
      return 'maxDurationWeeks';
    }
  }

  if (filter.partTimeAllowed && !hasLabel(listing, 'part time')) {
    return 'partTime';
  }

  if (filter.withJobOffer && !hasLabel(listing, 'job offer')) {
    return 'jobOffer';
  }

  return null;
}

export function matchesFilter(listing: ListingSummary, filter: SearchFilter, now: Date): boolean {
  return rejectionReason(listing, filter, now) === null;
}

/**
 * Local re-filter of remote search results
 */
export function filterListings<T extends ListingSummary>(
  listings: readonly T[],
  filter: SearchFilter,
  now: Date,
  logger?: Logger
): T[] {
  const passed: T[] = [];
  for (const listing of listings) {
    const reason = rejectionReason(listing, filter, now);
    if (reason === null) {
      passed.push(listing);
    } else {
      logger?.debug('Listing rejected by filter', { id: listing.id, reason });
    }
  }
  logger?.info('Applied local filters', { before: listings.length, after: passed.length });
  return passed;
}
