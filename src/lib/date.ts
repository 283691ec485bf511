/**
 * Date Utilities
 *
 * Calendar-day helpers for the batch windows. Dates travel as "YYYY-MM-DD"
 * strings (shop-local calendar days) everywhere outside this file.
 */

import { eachDayOfInterval, format, isValid, parseISO, subDays } from "date-fns";

export const DEFAULT_DAYS_BACK = 3;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export function isDateOnly(value: string): boolean {
  return DATE_ONLY.test(value) && isValid(parseISO(value));
}

export function toDateOnly(d: Date = new Date()): string {
  return format(d, "yyyy-MM-dd");
}

export interface DateWindow {
  start: string;
  end: string;
}

/**
 * Explicit start/end when both are given, otherwise the trailing `daysBack`
 * days ending today (inclusive on both ends).
 */
export function resolveWindow(
  options: { startDate?: string; endDate?: string; daysBack?: number },
  now: Date = new Date()
): DateWindow {
  if (options.startDate && options.endDate) {
    return { start: options.startDate, end: options.endDate };
  }
  const daysBack = options.daysBack ?? DEFAULT_DAYS_BACK;
  return { start: toDateOnly(subDays(now, daysBack)), end: toDateOnly(now) };
}

/** Every calendar day from start to end inclusive; empty when start > end. */
export function eachDay(start: string, end: string): string[] {
  if (start > end) return [];
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map((d) => toDateOnly(d));
}
