/**
 * Calendar-day arithmetic on luxon DateTimes (UTC, day precision).
 */

import { DateTime } from 'luxon';

/**
 * Add whole calendar years, keeping month and day.
 *
 * A day that does not exist in the target year rolls over into the next
 * month (29 Feb 2000 + 1 year = 1 Mar 2001). luxon's `plus({ years })` would
 * clamp to 28 Feb instead, so the day is re-applied as an offset from the
 * first of the month.
 */
export function addCalendarYears(date: DateTime, years: number): DateTime {
  const utc = date.toUTC();
  return DateTime.utc(utc.year + years, utc.month, 1).plus({ days: utc.day - 1 });
}

export function formatDay(date: DateTime): string {
  return date.toUTC().toFormat('yyyy-MM-dd');
}
