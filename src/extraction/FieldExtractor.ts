import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

/**
 * The DOM scope a strategy reads from: a parsed document plus the element
 * (card, message, page root) the field belongs to
 */
export interface DomContext {
  $: CheerioAPI;
  root: Cheerio<Element>;
}

/**
 * One candidate way of reading a field. Pure: returns undefined when it
 * does not match, never throws for a missing element.
 */
export type ExtractionStrategy<T> = (ctx: DomContext) => T | undefined;

export type FieldResult<T> =
  | { found: true; value: T; strategyIndex: number }
  | { found: false };

/**
 * Selector waterfall. Tries each strategy in order and short-circuits on the
 * first one that yields a value.
 */
export function extractField<T>(
  ctx: DomContext,
  strategies: ReadonlyArray<ExtractionStrategy<T>>
): FieldResult<T> {
  for (let i = 0; i < strategies.length; i++) {
    const value = strategies[i](ctx);
    if (value !== undefined) {
      return { found: true, value, strategyIndex: i };
    }
  }
  return { found: false };
}

/**
 * Waterfall with a default for the absent case
 */
export function extractOr<T>(
  ctx: DomContext,
  strategies: ReadonlyArray<ExtractionStrategy<T>>,
  fallback: T
): T {
  const result = extractField(ctx, strategies);
  return result.found ? result.value : fallback;
}

export function loadDocument(html: string): DomContext {
  const $ = cheerio.load(html);
  return { $, root: $('html') };
}

export function contextFor($: CheerioAPI, element: Element): DomContext {
  return { $, root: $(element) };
}

/**
 * Returns the elements matched by the first container selector that matches
 * anything, together with that selector
 */
export function findContainers(
  ctx: DomContext,
  selectors: readonly string[]
): { elements: Element[]; selector?: string } {
  for (const selector of selectors) {
    const matches = ctx.root.find(selector);
    if (matches.length > 0) {
      return { elements: matches.toArray(), selector };
    }
  }
  return { elements: [] };
}

// Strategy constructors

export function textAt(selector: string): ExtractionStrategy<string> {
  return ({ root }) => {
    const text = root.find(selector).first().text().trim();
    return text.length > 0 ? text : undefined;
  };
}

export function ownText(): ExtractionStrategy<string> {
  return ({ root }) => {
    const text = root.text().trim();
    return text.length > 0 ? text : undefined;
  };
}

export function attrAt(selector: string, attribute: string): ExtractionStrategy<string> {
  return ({ $, root }) => {
    for (const element of root.find(selector).toArray()) {
      const value = $(element).attr(attribute)?.trim();
      if (value) {
        return value;
      }
    }
    return undefined;
  };
}

export function allText(selector: string): ExtractionStrategy<string[]> {
  return ({ $, root }) => {
    const values = root
      .find(selector)
      .toArray()
      .map((element) => $(element).text().replace(/\s+/g, ' ').trim())
      .filter((text) => text.length > 0);
    return values.length > 0 ? values : undefined;
  };
}

export function allAttr(selector: string, attribute: string): ExtractionStrategy<string[]> {
  return ({ $, root }) => {
    const values: string[] = [];
    for (const element of root.find(selector).toArray()) {
      const value = $(element).attr(attribute)?.trim();
      if (value) {
        values.push(value);
      }
    }
    return values.length > 0 ? values : undefined;
  };
}

/**
 * Yields true when the selector matches; undefined otherwise so the
 * waterfall moves on
 */
export function exists(selector: string): ExtractionStrategy<boolean> {
  return ({ root }) => (root.find(selector).length > 0 ? true : undefined);
}

export function textCandidates(selectors: readonly string[]): ExtractionStrategy<string>[] {
  return selectors.map((selector) => textAt(selector));
}

export function listCandidates(selectors: readonly string[]): ExtractionStrategy<string[]>[] {
  return selectors.map((selector) => allText(selector));
}
