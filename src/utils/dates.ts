/**
 * Date normalization for feed entries.
 *
 * Feeds publish dates in RFC 2822, ISO 8601 and a handful of textual forms.
 * Each strategy either returns a UTC Date or null; the first match wins.
 * Values without a zone are read as UTC.
 */

export interface DateStrategy {
  name: string;
  parse: (input: string) => Date | null;
}

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11
};

// RFC 2822 obsolete zone names, in minutes east of UTC
const ZONES: Record<string, number> = {
  UT: 0, UTC: 0, GMT: 0, Z: 0,
  EST: -300, EDT: -240, CST: -360, CDT: -300,
  MST: -420, MDT: -360, PST: -480, PDT: -420
};

function monthIndex(name: string): number | undefined {
  const key = name.slice(0, 3).toLowerCase();
  if (!(key in MONTHS)) return undefined;
  // "Sept" and full names are fine, "Decimal" is not
  const full = ['january', 'february', 'march', 'april', 'may', 'june', 'july',
    'august', 'september', 'october', 'november', 'december'][MONTHS[key]];
  return full.startsWith(name.toLowerCase().replace(/\.$/, '')) ? MONTHS[key] : undefined;
}

function parseOffset(zone: string | undefined): number | undefined {
  if (!zone) return 0;
  const upper = zone.toUpperCase();
  if (upper in ZONES) return ZONES[upper];

  const match = zone.match(/^([+-])(\d{2}):?(\d{2})$/);
  if (!match) return undefined;
  const minutes = Number(match[2]) * 60 + Number(match[3]);
  return match[1] === '-' ? -minutes : minutes;
}

function expandYear(year: string): number {
  const value = Number(year);
  if (year.length > 2) return value;
  return value < 50 ? 2000 + value : 1900 + value;
}

/**
 * Build a UTC date from calendar fields, rejecting values the calendar
 * would silently roll over (30 February, 25:00).
 */
function utcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  millis = 0,
  offsetMinutes = 0
): Date | null {
  if (hours > 23 || minutes > 59 || seconds > 60) return null;

  const local = Date.UTC(year, month, day, hours, minutes, Math.min(seconds, 59), millis);
  const check = new Date(local);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month ||
    check.getUTCDate() !== day
  ) {
    return null;
  }

  return new Date(local - offsetMinutes * 60_000);
}

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?\s*(Z|[+-]\d{2}:?\d{2})?)?$/i;

const RFC_2822 =
  /^(?:[A-Za-z]{3,9},?\s+)?(\d{1,2})\s+([A-Za-z]{3,9})\.?\s+(\d{2}|\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([+-]\d{4}|[A-Za-z]{1,3}))?$/;

const DAY_MONTH_YEAR =
  /^(?:[A-Za-z]+,?\s+)?(\d{1,2})(?:st|nd|rd|th)?\s+([A-Za-z]+)\.?,?\s+(\d{4})(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

const MONTH_DAY_YEAR =
  /^(?:[A-Za-z]+,?\s+)?([A-Za-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})(?:,?\s+(?:at\s+)?(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

// Date.prototype.toString(): "Mon Dec 16 2024 10:00:00 GMT+0000 (Coordinated Universal Time)"
const DATE_STRING =
  /^(?:[A-Za-z]{3}\s+)?([A-Za-z]{3,9})\s+(\d{1,2})\s+(\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s+GMT([+-]\d{4})?$/;

const DAY_MONTH_HYPHENATED =
  /^(\d{1,2})-([A-Za-z]{3,9})-(\d{2}|\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

const YEAR_SLASHED = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;

const MONTH_SLASHED = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

// RFC 2822 allows a parenthesized comment after the zone: "+0000 (UTC)"
const TRAILING_COMMENT = /\s*\([^()]*\)$/;

const DAY_DOTTED = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

export const DATE_STRATEGIES: readonly DateStrategy[] = [
  {
    name: 'iso-8601',
    parse(input) {
      const m = input.match(ISO_8601);
      if (!m) return null;
      const offset = parseOffset(m[8]);
      if (offset === undefined) return null;
      const millis = m[7] ? Number(m[7].slice(0, 3).padEnd(3, '0')) : 0;
      return utcDate(
        Number(m[1]), Number(m[2]) - 1, Number(m[3]),
        Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0), millis, offset
      );
    }
  },
  {
    name: 'rfc-2822',
    parse(input) {
      const m = input.replace(TRAILING_COMMENT, '').match(RFC_2822);
      if (!m) return null;
      const month = monthIndex(m[2]);
      const offset = parseOffset(m[7]);
      if (month === undefined || offset === undefined) return null;
      return utcDate(
        expandYear(m[3]), month, Number(m[1]),
        Number(m[4]), Number(m[5]), Number(m[6] ?? 0), 0, offset
      );
    }
  },
  {
    name: 'date-string',
    parse(input) {
      const m = input.replace(TRAILING_COMMENT, '').match(DATE_STRING);
      if (!m) return null;
      const month = monthIndex(m[1]);
      const offset = parseOffset(m[7]);
      if (month === undefined || offset === undefined) return null;
      return utcDate(
        Number(m[3]), month, Number(m[2]),
        Number(m[4]), Number(m[5]), Number(m[6] ?? 0), 0, offset
      );
    }
  },
  {
    name: 'day-month-year',
    parse(input) {
      const m = input.match(DAY_MONTH_YEAR);
      if (!m) return null;
      const month = monthIndex(m[2]);
      if (month === undefined) return null;
      return utcDate(
        Number(m[3]), month, Number(m[1]),
        Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0)
      );
    }
  },
  {
    name: 'day-month-hyphenated',
    parse(input) {
      const m = input.match(DAY_MONTH_HYPHENATED);
      if (!m) return null;
      const month = monthIndex(m[2]);
      if (month === undefined) return null;
      return utcDate(
        expandYear(m[3]), month, Number(m[1]),
        Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0)
      );
    }
  },
  {
    name: 'month-day-year',
    parse(input) {
      const m = input.match(MONTH_DAY_YEAR);
      if (!m) return null;
      const month = monthIndex(m[1]);
      if (month === undefined) return null;
      return utcDate(
        Number(m[3]), month, Number(m[2]),
        Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0)
      );
    }
  },
  {
    name: 'year-slashed',
    parse(input) {
      const m = input.match(YEAR_SLASHED);
      return m ? utcDate(Number(m[1]), Number(m[2]) - 1, Number(m[3])) : null;
    }
  },
  {
    name: 'month-day-slashed',
    parse(input) {
      const m = input.match(MONTH_SLASHED);
      return m ? utcDate(Number(m[3]), Number(m[1]) - 1, Number(m[2])) : null;
    }
  },
  {
    name: 'day-dotted',
    parse(input) {
      const m = input.match(DAY_DOTTED);
      return m ? utcDate(Number(m[3]), Number(m[2]) - 1, Number(m[1])) : null;
    }
  }
];

/**
 * Normalize a feed date to UTC.
 * Returns null when no strategy matches; callers drop the entry rather than
 * substituting the current time.
 */
export function normalizeDate(
  raw: string | null | undefined,
  strategies: readonly DateStrategy[] = DATE_STRATEGIES
): Date | null {
  if (!raw) return null;
  const input = raw.trim().replace(/\s+/g, ' ');
  if (!input) return null;

  for (const strategy of strategies) {
    const date = strategy.parse(input);
    if (date && !isNaN(date.getTime())) {
      return date;
    }
  }
  return null;
}

/**
 * Midnight UTC of the calendar day `days` days before `now`'s UTC day.
 * Date.UTC carries day underflow across month and year boundaries.
 */
export function startOfUtcDayBefore(now: Date, days: number): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() - days));
}
