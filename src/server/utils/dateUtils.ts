/**
 * Calendar-day helpers.
 *
 * Days travel through the pipeline as `YYYY-MM-DD` strings. Arithmetic goes
 * through UTC epoch-day numbers so that DST shifts never move a day boundary,
 * and plain string comparison orders two days correctly.
 */

import { ValidationError } from '../types/errors.js';

/** Calendar day formatted as `YYYY-MM-DD` */
export type IsoDate = string;

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Placeholder the upstream store writes for an unset date
 */
export const SENTINEL_DATE: IsoDate = '1899-12-31';

/**
 * Anything earlier than this is a stored "null", never a real date
 */
export const SENTINEL_CUTOFF: IsoDate = '1900-12-31';

/**
 * UTC midnight of a calendar day. `Date.UTC` reads years 0-99 as 1900-1999,
 * so the year is set separately.
 */
function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

/**
 * True when the value has the `YYYY-MM-DD` shape, whether or not the day exists
 */
export function isIsoDateShaped(value: string): boolean {
  return ISO_DATE_PATTERN.test(value);
}

/**
 * Validate a `YYYY-MM-DD` string that names a real calendar day
 */
export function isValidIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  return utcDate(Number(year), Number(month), Number(day)).toISOString().slice(0, 10) === value;
}

/**
 * Parse a `YYYY-MM-DD` string
 *
 * @throws ValidationError if the value is not a real calendar day
 */
export function parseIsoDate(value: string, field: string = 'date'): IsoDate {
  const trimmed = value.trim();
  if (!isValidIsoDate(trimmed)) {
    throw new ValidationError(`Invalid ${field}: "${value}". Expected format YYYY-MM-DD`, { field, value });
  }
  return trimmed;
}

/**
 * True when the stored date means "not set"
 */
export function isSentinelDate(date: IsoDate): boolean {
  return date < SENTINEL_CUTOFF;
}

export function toEpochDay(date: IsoDate): number {
  const match = ISO_DATE_PATTERN.exec(date);
  if (!match) {
    throw new ValidationError(`Invalid date: "${date}". Expected format YYYY-MM-DD`, { value: date });
  }
  return Math.round(utcDate(Number(match[1]), Number(match[2]), Number(match[3])).getTime() / MS_PER_DAY);
}

export function fromEpochDay(epochDay: number): IsoDate {
  return new Date(epochDay * MS_PER_DAY).toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/**
 * Whole days from `earlier` to `later` (negative when `later` comes first)
 */
export function diffDays(later: IsoDate, earlier: IsoDate): number {
  return toEpochDay(later) - toEpochDay(earlier);
}

/**
 * Every day from `start` to `end`, both inclusive. Empty when `end` precedes `start`.
 */
export function eachDay(start: IsoDate, end: IsoDate): IsoDate[] {
  const first = toEpochDay(start);
  const last = toEpochDay(end);
  const days: IsoDate[] = [];
  for (let day = first; day <= last; day++) {
    days.push(fromEpochDay(day));
  }
  return days;
}

/**
 * The calendar day of `now` in the process's local time zone
 */
export function localIsoDate(now: Date = new Date()): IsoDate {
  const year = String(now.getFullYear()).padStart(4, '0');
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
