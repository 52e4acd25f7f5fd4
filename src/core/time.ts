/**
 * Time utilities for consistent date handling
 */

import { addDays, differenceInCalendarDays, format, parseISO } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function daysFrom(date: Date, days: number): string {
  return formatDate(addDays(date, days));
}

export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

/** Calendar days from one YYYY-MM-DD date to another; negative when `to` is earlier */
export function calendarDaysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}
