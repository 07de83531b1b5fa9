/**
 * Day Locator
 *
 * Binary search over an ascending price series for the first sample on or
 * after a calendar day.
 */

import type { DateTime } from 'luxon';
import type { PriceSeries } from '@retirecheck/core';

/**
 * Find the smallest index `i >= fromIndex` with `series[i].date >= target`.
 *
 * `fromIndex` restricts the search to the window a simulation may see, so a
 * start date never resolves to an earlier sample with the same date.
 *
 * @returns the index, or `undefined` when every sample in the window is before `target`
 */
export function locateDay(
  target: DateTime,
  series: PriceSeries,
  fromIndex: number = 0
): number | undefined {
  const targetMillis = target.toMillis();
  let lo = Math.max(0, fromIndex);
  let hi = series.length;

  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const sample = series[mid];
    if (sample !== undefined && sample.date.toMillis() >= targetMillis) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }

  return lo < series.length ? lo : undefined;
}
