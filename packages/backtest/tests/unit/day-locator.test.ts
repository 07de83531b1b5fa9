import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import type { PriceSeries } from '@retirecheck/core';
import { locateDay } from '../../src/time/day-locator.js';

const day = (iso: string): DateTime => DateTime.fromISO(iso, { zone: 'utc' });

const series: PriceSeries = [
  { date: day('2000-01-03'), price: 10 },
  { date: day('2000-01-04'), price: 11 },
  { date: day('2000-01-04'), price: 12 },
  { date: day('2000-01-10'), price: 13 },
];

describe('locateDay', () => {
  it('returns the first sample when the target precedes the series', () => {
    expect(locateDay(day('2000-01-01'), series)).toBe(0);
  });

  it('returns the first of several samples on the target date', () => {
    expect(locateDay(day('2000-01-04'), series)).toBe(1);
  });

  it('skips forward over missing days', () => {
    expect(locateDay(day('2000-01-05'), series)).toBe(3);
  });

  it('returns undefined past the last sample', () => {
    expect(locateDay(day('2000-01-11'), series)).toBeUndefined();
  });

  it('only searches from fromIndex onward', () => {
    expect(locateDay(day('2000-01-04'), series, 2)).toBe(2);
    expect(locateDay(day('2000-01-01'), series, 3)).toBe(3);
  });

  it('returns undefined for an empty series or a window past the end', () => {
    expect(locateDay(day('2000-01-01'), [])).toBeUndefined();
    expect(locateDay(day('2000-01-01'), series, 4)).toBeUndefined();
  });
});
