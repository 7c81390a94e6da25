/**
 * Temporal normalizer
 *
 * Converts the feeds' calendar-date strings ("1900-Jan-01 12:00") to UTC
 * instants and back to the fixed "YYYY-MM-DD HH:MM" form. The feeds carry no
 * sub-minute precision, so seconds are dropped on the way in and never
 * rendered on the way out.
 */

import { FormatError } from '../errors/index.js';

/** An instant is a UTC Date; the unset instant is an invalid Date. */
export type Instant = Date;

const MONTHS: ReadonlyMap<string, number> = new Map([
  ['jan', 1],
  ['feb', 2],
  ['mar', 3],
  ['apr', 4],
  ['may', 5],
  ['jun', 6],
  ['jul', 7],
  ['aug', 8],
  ['sep', 9],
  ['oct', 10],
  ['nov', 11],
  ['dec', 12],
]);

// YYYY-MMM-DD or YYYY-MM-DD, then optional [ T]HH:MM[:SS[.fff]]
const INSTANT_PATTERN =
  /^(\d{4})-([A-Za-z]{3}|\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;

function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month; 2000 is a leap year, 2001 is not.
  return new Date(Date.UTC(isLeapYear(year) ? 2000 : 2001, month, 0)).getUTCDate();
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function parseMonth(token: string, raw: string): number {
  const month = /^\d{2}$/.test(token) ? Number(token) : MONTHS.get(token.toLowerCase());
  if (month === undefined || month < 1 || month > 12) {
    throw new FormatError(raw, `Unknown month "${token}" in "${raw}"`);
  }
  return month;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * The unset instant. A fresh invalid Date per call so callers cannot share
 * (and mutate) one instance.
 */
export function unsetInstant(): Instant {
  return new Date(Number.NaN);
}

export function isUnsetInstant(instant: Instant): boolean {
  return Number.isNaN(instant.getTime());
}

/**
 * Parse a feed date-time string.
 *
 * Absent or blank input yields the unset instant; anything else that does not
 * match a recognized pattern, or names an impossible calendar date, throws.
 *
 * @throws FormatError
 */
export function parseInstant(raw: string | null | undefined): Instant {
  if (raw === null || raw === undefined) return unsetInstant();

  const text = raw.trim();
  if (text === '') return unsetInstant();

  const match = INSTANT_PATTERN.exec(text);
  if (!match) {
    throw new FormatError(raw);
  }

  const [, yearText = '', monthText = '', dayText = '', hourText, minuteText, secondText] = match;
  const year = Number(yearText);
  const month = parseMonth(monthText, raw);
  const day = Number(dayText);
  const hour = hourText === undefined ? 0 : Number(hourText);
  const minute = minuteText === undefined ? 0 : Number(minuteText);
  const second = secondText === undefined ? 0 : Number(secondText);

  if (day < 1 || day > daysInMonth(year, month)) {
    throw new FormatError(raw, `Day out of range in "${raw}"`);
  }
  if (hour > 23 || minute > 59 || second > 59) {
    throw new FormatError(raw, `Time of day out of range in "${raw}"`);
  }

  // setUTCFullYear, not Date.UTC: Date.UTC maps years 0-99 onto 1900-1999.
  const instant = new Date(0);
  instant.setUTCFullYear(year, month - 1, day);
  instant.setUTCHours(hour, minute, 0, 0);
  return instant;
}

function assertSet(instant: Instant): void {
  if (isUnsetInstant(instant)) {
    throw new FormatError('', 'Cannot format an unset instant');
  }
}

/**
 * Render as "YYYY-MM-DD HH:MM" (UTC).
 *
 * @throws FormatError for the unset instant
 */
export function formatInstant(instant: Instant): string {
  assertSet(instant);
  return `${formatDate(instant)} ${pad(instant.getUTCHours())}:${pad(instant.getUTCMinutes())}`;
}

/**
 * Render the UTC calendar date as "YYYY-MM-DD".
 *
 * @throws FormatError for the unset instant
 */
export function formatDate(instant: Instant): string {
  assertSet(instant);
  return `${pad(instant.getUTCFullYear(), 4)}-${pad(instant.getUTCMonth() + 1)}-${pad(instant.getUTCDate())}`;
}
