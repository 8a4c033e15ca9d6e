/**
 * Time utilities for consistent date handling
 * Simulation dates are always 'yyyy-MM-dd' strings.
 */

import { differenceInCalendarDays, isValid, parseISO } from 'date-fns';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && isValid(parseISO(value));
}

/**
 * Compares two ISO dates. Lexical order equals chronological order for yyyy-MM-dd.
 */
export function compareDates(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function calendarDaysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

/**
 * Distinct dates within [start, end], ascending.
 */
export function tradingDaysWithin(dates: Iterable<string>, start: string, end: string): string[] {
  const unique = new Set<string>();
  for (const date of dates) {
    if (compareDates(date, start) >= 0 && compareDates(date, end) <= 0) {
      unique.add(date);
    }
  }
  return [...unique].sort(compareDates);
}
