import { z } from 'zod';
import type { ListingSummary } from './ListingSummary';

/**
 * Fields only available on a listing's own page
 */
export const ListingDetailFieldsSchema = z.object({
  description: z.string(),
  responsibilities: z.array(z.string()),
  skills: z.array(z.string()),
  perks: z.array(z.string()),
  openings: z.number().int().nonnegative().nullable(),
  whoCanApply: z.string().nullable(),
  companyDescription: z.string().nullable(),
});

export type ListingDetailFields = z.infer<typeof ListingDetailFieldsSchema>;

export type ListingDetail = ListingSummary &
  Readonly<
    Omit<ListingDetailFields, 'responsibilities' | 'skills' | 'perks'> & {
      responsibilities: readonly string[];
      skills: readonly string[];
      perks: readonly string[];
    }
  >;

export function createListingDetail(summary: ListingSummary, fields: ListingDetailFields): ListingDetail {
  const parsed = ListingDetailFieldsSchema.parse(fields);
  return Object.freeze({
    ...summary,
    ...parsed,
    responsibilities: Object.freeze([...parsed.responsibilities]),
    skills: Object.freeze([...parsed.skills]),
    perks: Object.freeze([...parsed.perks]),
  });
}

export function isListingDetail(listing: ListingSummary | ListingDetail): listing is ListingDetail {
  return 'description' in listing;
}
