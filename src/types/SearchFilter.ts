import { z } from 'zod';
import { WorkMode } from './ListingSummary';

export enum CompanyType {
  STARTUP = 'startup',
  ESTABLISHED = 'established',
}

/**
 * Schema for listing search constraints. Every field is optional; an empty
 * filter passes every listing.
 */
export const SearchFilterSchema = z
  .object({
    keywords: z.array(z.string().trim().min(1)).default([]),
    locations: z.array(z.string().trim().min(1)).default([]),
    minStipend: z.number().nonnegative().optional(),
    maxStipend: z.number().nonnegative().optional(),
    workMode: z.nativeEnum(WorkMode).optional(),
    categories: z.array(z.string().trim().min(1)).default([]),
    companyTypes: z.array(z.nativeEnum(CompanyType)).default([]),
    excludeUnpaid: z.boolean().default(false),
    postedWithinDays: z.number().int().positive().optional(),
    maxDurationWeeks: z.number().int().positive().optional(),
    partTimeAllowed: z.boolean().optional(),
    withJobOffer: z.boolean().optional(),
  })
  .refine(
    (filter) =>
      filter.minStipend === undefined ||
      filter.maxStipend === undefined ||
      filter.minStipend <= filter.maxStipend,
    { message: 'minStipend must not exceed maxStipend', path: ['minStipend'] }
  );

export type SearchFilter = Readonly<z.infer<typeof SearchFilterSchema>>;
export type SearchFilterInput = z.input<typeof SearchFilterSchema>;

/**
 * @throws ZodError on an invalid filter
 */
export function createSearchFilter(input: SearchFilterInput = {}): SearchFilter {
  return Object.freeze(SearchFilterSchema.parse(input));
}
