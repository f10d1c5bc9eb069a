import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { parseStipend } from '../utils/stipendParser';

export enum WorkMode {
  ON_SITE = 'on-site',
  REMOTE = 'remote',
  HYBRID = 'hybrid',
}

/**
 * Schema for an internship listing as shown on a search results card
 */
export const ListingSummarySchema = z.object({
  id: z.string().min(1, 'Listing ID is required'),
  title: z.string().min(1, 'Title is required'),
  company: z.string(),
  location: z.string(),
  mode: z.nativeEnum(WorkMode),
  stipendText: z.string(),
  stipendMin: z.number().nullable(),
  stipendMax: z.number().nullable(),
  duration: z.string(),
  postedDate: z.date().nullable(),
  applyBy: z.date().nullable(),
  url: z.string(),
  isStartup: z.boolean(),
  tags: z.array(z.string()),
});

type ListingSummaryRecord = z.infer<typeof ListingSummarySchema>;

/**
 * Immutable listing summary
 */
export type ListingSummary = Readonly<Omit<ListingSummaryRecord, 'tags'> & { tags: readonly string[] }>;

/**
 * Everything a parser supplies; stipend bounds and a missing id are derived
 */
export type ListingSummaryInput = Omit<ListingSummaryRecord, 'id' | 'stipendMin' | 'stipendMax'> & {
  id?: string;
};

/**
 * Extracts the numeric listing id the portal appends to detail URLs
 * (".../detail/remote-data-analyst-internship-at-acme1729503214")
 */
export function listingIdFromUrl(url: string): string | null {
  const match = url.match(/(\d{5,})\/?(?:[?#].*)?$/);
  return match ? match[1] : null;
}

/**
 * Validates and freezes a listing. Stipend bounds are derived from
 * `stipendText` here, exactly once.
 * @throws ZodError if the title is empty
 */
export function createListingSummary(input: ListingSummaryInput): ListingSummary {
  const { min, max } = parseStipend(input.stipendText);
  const record = ListingSummarySchema.parse({
    ...input,
    id: input.id ?? listingIdFromUrl(input.url) ?? uuidv4(),
    stipendMin: min,
    stipendMax: max,
  });
  return Object.freeze({ ...record, tags: Object.freeze([...record.tags]) });
}
