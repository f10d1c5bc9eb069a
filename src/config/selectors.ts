import { z } from 'zod';
import selectorsJson from './selectors.json';

/**
 * Prioritised selector candidates for the target site, loaded from
 * selectors.json. Order within each list is the waterfall order.
 */

const SelectorList = z.array(z.string().min(1)).min(1);

export const SiteSelectorsSchema = z.object({
  paths: z.object({
    login: z.string().startsWith('/'),
    dashboard: z.string().startsWith('/'),
    messages: z.string().startsWith('/'),
    internships: z.string().startsWith('/'),
  }),
  auth: z.object({
    emailInputs: SelectorList,
    passwordInputs: SelectorList,
    submitButtons: SelectorList,
    successIndicators: SelectorList,
    errorIndicators: SelectorList,
    logoutButtons: SelectorList,
  }),
  messages: z.object({
    pageReady: SelectorList,
    threads: SelectorList,
    threadLink: SelectorList,
    threadOpened: SelectorList,
    items: SelectorList,
    content: SelectorList,
    sender: SelectorList,
    timestamp: SelectorList,
    attachments: SelectorList,
  }),
  listings: z.object({
    resultsReady: SelectorList,
    cards: SelectorList,
    title: SelectorList,
    link: SelectorList,
    linkAttributes: SelectorList,
    company: SelectorList,
    location: SelectorList,
    stipend: SelectorList,
    duration: SelectorList,
    applyBy: SelectorList,
    posted: SelectorList,
    startupBadge: SelectorList,
    tags: SelectorList,
    nextPage: SelectorList,
  }),
  details: z.object({
    ready: SelectorList,
    description: SelectorList,
    responsibilities: SelectorList,
    skills: SelectorList,
    perks: SelectorList,
    openings: SelectorList,
    whoCanApply: SelectorList,
    companyDescription: SelectorList,
  }),
});

export type SiteSelectors = z.infer<typeof SiteSelectorsSchema>;
export type AuthSelectors = SiteSelectors['auth'];
export type MessageSelectors = SiteSelectors['messages'];
export type ListingSelectors = SiteSelectors['listings'];
export type DetailSelectors = SiteSelectors['details'];
export type SitePaths = SiteSelectors['paths'];

export const siteSelectors: SiteSelectors = SiteSelectorsSchema.parse(selectorsJson);

/**
 * Resolves a site path against the configured base URL
 */
export function siteUrl(baseUrl: string, sitePath: string): string {
  return new URL(sitePath, baseUrl).toString();
}
