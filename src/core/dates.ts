/**
 * Calendar date handling for date nodes.
 *
 * Dates are keyed by their canonical `YYYY-MM-DD` string in local time,
 * at day granularity.
 */

import { GraphError } from './graph/errors.js';

/** `digits "-" digits "-" digits` */
const DATE_GRAMMAR = /^(\d+)-(\d+)-(\d+)$/;

export type RelativeDate = 'today' | 'tomorrow' | 'yesterday';

const RELATIVE_OFFSETS: Record<RelativeDate, number> = {
  yesterday: -1,
  today: 0,
  tomorrow: 1,
};

const MONTHS: ReadonlyArray<readonly string[]> = [
  ['jan', 'january'],
  ['feb', 'february'],
  ['mar', 'march'],
  ['apr', 'april'],
  ['may'],
  ['jun', 'june'],
  ['jul', 'july'],
  ['aug', 'august'],
  ['sep', 'september'],
  ['oct', 'october'],
  ['nov', 'november'],
  ['dec', 'december'],
];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function canonical(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/** Whether the token has the shape of a date, valid or not. */
export function matchesDateGrammar(token: string): boolean {
  return DATE_GRAMMAR.test(token);
}

/**
 * Parse a `Y-M-D` token into its canonical key.
 * Returns null when the token does not have the date shape at all;
 * throws MalformedDate when it does but names no calendar day.
 */
export function parseDateKey(token: string): string | null {
  const match = DATE_GRAMMAR.exec(token);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw GraphError.malformedDate(token);
  }
  return canonical(year, month, day);
}

/** Canonical key of a Date, read in local time. */
export function formatDateKey(date: Date): string {
  return canonical(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

export function isRelativeDate(token: string): token is RelativeDate {
  return token === 'today' || token === 'tomorrow' || token === 'yesterday';
}

/** Resolve `today` / `tomorrow` / `yesterday` against `now`. */
export function resolveRelativeDate(keyword: RelativeDate, now: Date = new Date()): string {
  const shifted = new Date(now.getFullYear(), now.getMonth(), now.getDate() + RELATIVE_OFFSETS[keyword]);
  return formatDateKey(shifted);
}

/**
 * Parse free-form date input for commands that create or address date nodes.
 *
 * Accepts canonical dates, the relative keywords, and month names
 * (the first of that month in the current year).
 */
export function parseDateInput(input: string, now: Date = new Date()): string {
  const token = input.trim().toLowerCase();

  const key = parseDateKey(token);
  if (key !== null) return key;

  if (isRelativeDate(token)) return resolveRelativeDate(token, now);

  const monthIndex = MONTHS.findIndex((names) => names.includes(token));
  if (monthIndex >= 0) {
    return canonical(now.getFullYear(), monthIndex + 1, 1);
  }

  throw GraphError.malformedDate(input);
}
