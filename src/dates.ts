import { ConfigError } from './errors.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Parse a YYYY-MM-DD string into a Date at UTC midnight. Returns null when the
 * string is not a real calendar day (2026-02-30 does not round-trip).
 */
export function tryParseIsoDate(str: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str);
  if (!match) return null;

  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return toIsoDate(date) === str ? date : null;
}

export function parseIsoDate(str: string): Date {
  const date = tryParseIsoDate(str);
  if (!date) {
    throw new ConfigError(`Invalid date: ${str}. Use YYYY-MM-DD`);
  }
  return date;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/** The label detection logs use in their Local Date column, e.g. 20-Jan-2026. */
export function toLocalDateLabel(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${day}-${MONTHS[date.getUTCMonth()]}-${date.getUTCFullYear()}`;
}

/** The host's local calendar day, as UTC midnight. */
export function currentCalendarDate(now: Date = new Date()): Date {
  return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
}

// Two days back: the later UTC file of yesterday's local day may still be incomplete.
export function defaultLocalDate(now: Date = new Date()): Date {
  return addDays(currentCalendarDate(now), -2);
}

export function defaultUtcDate(now: Date = new Date()): Date {
  return addDays(currentCalendarDate(now), -1);
}
