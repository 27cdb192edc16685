import type { IsoDate } from "./types.js";

const ISO_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : MONTH_DAYS[month - 1];
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  return year >= 1 && year <= 9999 && month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

export function formatIsoDate(year: number, month: number, day: number): IsoDate {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Decode a YYYYMMDD integer. Zero, anything whose decimal text is not exactly
 * eight digits, and impossible calendar dates all decode to null.
 */
export function parsePackedDate(value: number | null): IsoDate | null {
  if (value === null || value === 0) return null;
  const text = String(value);
  if (text.length !== 8 || !/^\d{8}$/.test(text)) return null;
  const year = Number(text.slice(0, 4));
  const month = Number(text.slice(4, 6));
  const day = Number(text.slice(6, 8));
  return isValidCalendarDate(year, month, day) ? formatIsoDate(year, month, day) : null;
}

/** Day part of a date or timestamp text; null when it does not start with a valid date. */
export function truncateToDate(value: string | null): IsoDate | null {
  if (value === null) return null;
  const match = value.match(ISO_PREFIX);
  if (!match) return null;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  return isValidCalendarDate(year, month, day) ? formatIsoDate(year, month, day) : null;
}

function toUtcDate(iso: IsoDate): Date {
  const match = iso.match(ISO_PREFIX);
  if (!match) throw new RangeError(`Not an ISO date: ${iso}`);
  const date = new Date(0);
  // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx
  date.setUTCFullYear(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return date;
}

export function addDays(iso: IsoDate, days: number): IsoDate {
  const date = toUtcDate(iso);
  date.setUTCDate(date.getUTCDate() + days);
  return formatIsoDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/** True when midnight (UTC) of `iso` lies after `now`. */
export function isAfter(iso: IsoDate, now: Date): boolean {
  return toUtcDate(iso).getTime() > now.getTime();
}
