import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { addCalendarYears, formatDay } from '../../src/time/calendar.js';

describe('addCalendarYears', () => {
  it('keeps month and day', () => {
    expect(formatDay(addCalendarYears(DateTime.utc(2001, 1, 31), 10))).toBe('2011-01-31');
  });

  it('rolls 29 February over to 1 March in a non-leap year', () => {
    expect(formatDay(addCalendarYears(DateTime.utc(2000, 2, 29), 1))).toBe('2001-03-01');
  });

  it('keeps 29 February when the target year is a leap year', () => {
    expect(formatDay(addCalendarYears(DateTime.utc(2000, 2, 29), 4))).toBe('2004-02-29');
  });

  it('returns a UTC start-of-day value', () => {
    const result = addCalendarYears(DateTime.utc(1999, 12, 31), 1);
    expect(result.toISO()).toBe('2000-12-31T00:00:00.000Z');
  });
});

describe('formatDay', () => {
  it('formats as yyyy-MM-dd', () => {
    expect(formatDay(DateTime.utc(1987, 10, 19))).toBe('1987-10-19');
  });
});
