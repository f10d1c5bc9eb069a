/**
 * Numeric bounds of a stipend, null when unpaid or unparseable
 */
export interface StipendRange {
  min: number | null;
  max: number | null;
}

const UNPAID_MARKERS = new Set(['', 'unpaid', 'no stipend', '-']);

/**
 * Parses stipend text into numeric bounds.
 * Handles currency symbols, thousands separators, "K" suffixes, ranges and
 * per-month/per-week suffixes. Deterministic, so the same text always yields
 * the same bounds.
 *
 * @example
 * parseStipend('₹5K-20K')         // { min: 5000, max: 20000 }
 * parseStipend('₹15,000 /month')  // { min: 15000, max: 15000 }
 * parseStipend('Unpaid')          // { min: null, max: null }
 */
export function parseStipend(text: string | null | undefined): StipendRange {
  const normalized = (text ?? '').trim();
  if (UNPAID_MARKERS.has(normalized.toLowerCase())) {
    return { min: null, max: null };
  }

  const cleaned = normalized.replace(/[₹,]/g, '').replace(/\/\s*(month|week)/gi, ' ');

  const amounts: number[] = [];
  for (const match of cleaned.matchAll(/(\d+(?:\.\d+)?)\s?(k\b)?/gi)) {
    const value = Number(match[1]);
    if (Number.isFinite(value)) {
      amounts.push(match[2] ? value * 1000 : value);
    }
  }

  if (amounts.length === 0) {
    return { min: null, max: null };
  }
  return { min: Math.min(...amounts), max: Math.max(...amounts) };
}
