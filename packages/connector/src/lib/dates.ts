/**
 * Date utilities
 *
 * Calendar dates are handled as YYYY-MM-DD strings. Arithmetic runs in UTC
 * on those strings so results never shift with the host timezone.
 */

import type { DateRange } from "../types.js";

export const WEEKDAYS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export const MONTHS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
] as const;
export type Month = (typeof MONTHS)[number];

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local calendar date of an instant (YYYY-MM-DD)
 */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function isDateString(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Date part of a record timestamp
 */
export function datePart(timestamp: string): string {
  return timestamp.slice(0, 10);
}

function toUtcMidnight(dateStr: string): number {
  return Date.parse(`${dateStr}T00:00:00Z`);
}

export function addDays(dateStr: string, days: number): string {
  return new Date(toUtcMidnight(dateStr) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcMidnight(to) - toUtcMidnight(from)) / MS_PER_DAY);
}

/**
 * Every date from start to end, inclusive
 */
export function eachDate(start: string, end: string): string[] {
  const dates: string[] = [];
  for (let d = start; d <= end; d = addDays(d, 1)) {
    dates.push(d);
  }
  return dates;
}

export function weekdayOf(dateStr: string): Weekday {
  // getUTCDay: 0 = Sunday
  const day = new Date(toUtcMidnight(dateStr)).getUTCDay();
  return WEEKDAYS[(day + 6) % 7];
}

export function monthOf(dateStr: string): Month {
  return MONTHS[Number(dateStr.slice(5, 7)) - 1];
}

export function minutesSince(isoInstant: string, now: Date): number {
  return Math.floor((now.getTime() - Date.parse(isoInstant)) / 60_000);
}

/**
 * Split an inclusive date range into chunks of at most `maxDays` days, oldest first.
 */
export function splitRange(range: DateRange, maxDays: number): DateRange[] {
  const chunks: DateRange[] = [];
  let start = range.start;
  while (start <= range.end) {
    const candidate = addDays(start, maxDays - 1);
    const end = candidate < range.end ? candidate : range.end;
    chunks.push({ start, end });
    start = addDays(end, 1);
  }
  return chunks;
}
