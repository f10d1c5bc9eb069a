/**
 * Date and time parsing for the portal's display formats.
 * Calendar dates without a zone are interpreted in the site's timezone
 * (Asia/Kolkata, UTC+05:30, no DST).
 */

const SITE_UTC_OFFSET_MINUTES = 330;
const OFFSET_MS = SITE_UTC_OFFSET_MINUTES * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

function monthIndex(name: string): number | undefined {
  return MONTHS[name.slice(0, 3).toLowerCase()];
}

/**
 * Builds an instant from wall-clock fields in the site's timezone.
 * Returns null for impossible dates such as 31 February.
 */
export function siteDate(
  year: number,
  monthZeroBased: number,
  day: number,
  hours: number = 0,
  minutes: number = 0,
  seconds: number = 0
): Date | null {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const utc = Date.UTC(year, monthZeroBased, day, hours, minutes, seconds);
  const check = new Date(utc);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== monthZeroBased ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return new Date(utc - OFFSET_MS);
}

/**
 * Midnight of `now`'s calendar day in the site's timezone
 */
export function startOfSiteDay(now: Date): Date {
  const local = new Date(now.getTime() + OFFSET_MS);
  return new Date(
    Date.UTC(local.getUTCFullYear(), local.getUTCMonth(), local.getUTCDate()) - OFFSET_MS
  );
}

function expandYear(year: string): number {
  const value = Number(year);
  return year.length === 2 ? 2000 + value : value;
}

/**
 * Parses relative expressions such as "3 days ago", "last 5 days",
 * "yesterday", "today" or "last month" (30 days)
 * @returns The instant, or null if the text is not a relative date
 */
export function parseRelativeDate(text: string, now: Date = new Date()): Date | null {
  const normalized = text.toLowerCase().trim();
  const nowMs = now.getTime();

  const rules: Array<[RegExp, (match: RegExpMatchArray) => Date]> = [
    [/(?:last|past)\s+(\d+)\s+days?/, (m) => new Date(nowMs - Number(m[1]) * DAY_MS)],
    [/(\d+)\s+days?\s+ago/, (m) => new Date(nowMs - Number(m[1]) * DAY_MS)],
    [/(\d+)\s+hours?\s+ago/, (m) => new Date(nowMs - Number(m[1]) * HOUR_MS)],
    [/(\d+)\s+weeks?\s+ago/, (m) => new Date(nowMs - Number(m[1]) * 7 * DAY_MS)],
    [/(\d+)\s+months?\s+ago/, (m) => new Date(nowMs - Number(m[1]) * 30 * DAY_MS)],
    [/yesterday/, () => new Date(nowMs - DAY_MS)],
    [/last week/, () => new Date(nowMs - 7 * DAY_MS)],
    [/last month/, () => new Date(nowMs - 30 * DAY_MS)],
    [/just now|few (?:hours|minutes) ago/, () => new Date(nowMs)],
    [/today/, () => startOfSiteDay(now)],
  ];

  for (const [pattern, resolve] of rules) {
    const match = normalized.match(pattern);
    if (match) {
      return resolve(match);
    }
  }
  return null;
}

/**
 * Parses a date as the portal displays it: relative expressions first, then
 * "Dec 15, 2023", "December 15, 2023", "15 Dec' 23", "15 Dec 2023",
 * "15/12/2023", "15-12-2023" and "2023-12-15". Leading labels such as
 * "Apply by" or "Posted on" are ignored.
 */
export function parseSiteDate(text: string, now: Date = new Date()): Date | null {
  const trimmed = text
    .trim()
    .replace(/^(?:apply\s+by|posted(?:\s+on)?|starts?(?:\s+on)?)\s*:?\s*/i, '');
  if (!trimmed) {
    return null;
  }

  const relative = parseRelativeDate(trimmed, now);
  if (relative) {
    return relative;
  }

  let match = trimmed.match(/^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/);
  if (match) {
    const month = monthIndex(match[1]);
    return month === undefined ? null : siteDate(Number(match[3]), month, Number(match[2]));
  }

  match = trimmed.match(/^(\d{1,2})\s+([A-Za-z]+)'?\s*(\d{4}|\d{2})$/);
  if (match) {
    const month = monthIndex(match[2]);
    return month === undefined ? null : siteDate(expandYear(match[3]), month, Number(match[1]));
  }

  match = trimmed.match(/^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/);
  if (match) {
    return siteDate(Number(match[3]), Number(match[2]) - 1, Number(match[1]));
  }

  match = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (match) {
    return siteDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  }

  return null;
}

function to24Hour(hours: number, meridiem: string): number {
  const pm = meridiem.toLowerCase() === 'pm';
  if (hours === 12) {
    return pm ? 12 : 0;
  }
  return pm ? hours + 12 : hours;
}

/**
 * Parses a chat timestamp. Time-only forms ("14:30", "2:30 PM") resolve to
 * that time on `now`'s day. Falls back to `now` when nothing matches.
 */
export function parseMessageTimestamp(text: string, now: Date = new Date()): Date {
  const trimmed = text.trim();
  const today = new Date(startOfSiteDay(now).getTime() + OFFSET_MS);
  const y = today.getUTCFullYear();
  const mo = today.getUTCMonth();
  const d = today.getUTCDate();

  let match = trimmed.match(/^(\d{1,2}):(\d{2})$/);
  if (match) {
    return siteDate(y, mo, d, Number(match[1]), Number(match[2])) ?? now;
  }

  match = trimmed.match(/^(\d{1,2}):(\d{2})\s*([AaPp][Mm])$/);
  if (match) {
    return siteDate(y, mo, d, to24Hour(Number(match[1]), match[3]), Number(match[2])) ?? now;
  }

  match = trimmed.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{2})$/);
  if (match) {
    return (
      siteDate(
        Number(match[3]),
        Number(match[2]) - 1,
        Number(match[1]),
        Number(match[4]),
        Number(match[5])
      ) ?? now
    );
  }

  match = trimmed.match(/^(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/);
  if (match) {
    return (
      siteDate(
        Number(match[1]),
        Number(match[2]) - 1,
        Number(match[3]),
        Number(match[4]),
        Number(match[5]),
        Number(match[6])
      ) ?? now
    );
  }

  match = trimmed.match(/^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})\s+(\d{1,2}):(\d{2})\s*([AaPp][Mm])$/);
  if (match) {
    const month = monthIndex(match[1]);
    if (month !== undefined) {
      return (
        siteDate(
          Number(match[3]),
          month,
          Number(match[2]),
          to24Hour(Number(match[4]), match[6]),
          Number(match[5])
        ) ?? now
      );
    }
  }

  return parseSiteDate(trimmed, now) ?? now;
}

/**
 * Lower-cases, collapses spaces and pluralizes month/week units
 * @example normalizeDuration('6 Month') // '6 months'
 */
export function normalizeDuration(text: string): string {
  if (!text) {
    return '';
  }
  return text
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/\bmonths?\b/g, 'months')
    .replace(/\bweeks?\b/g, 'weeks');
}

const WEEKS_PER_MONTH = 52 / 12;

/**
 * Length of a duration in whole weeks, taking the upper end of a range
 * @example durationInWeeks('3 Months')     // 13
 * @example durationInWeeks('4-6 weeks')    // 6
 * @returns null when the text names no month or week count
 */
export function durationInWeeks(text: string): number | null {
  const match = /(\d+(?:\.\d+)?)\s*(months|weeks)/.exec(normalizeDuration(text));
  if (!match) {
    return null;
  }
  const value = Number(match[1]);
  return match[2] === 'months' ? Math.round(value * WEEKS_PER_MONTH) : value;
}

/**
 * True when `date` is no older than `days` days before `now`
 */
export function isWithinDays(date: Date, days: number, now: Date = new Date()): boolean {
  return date.getTime() >= now.getTime() - days * DAY_MS;
}
