/**
 * Core domain types shared by the loader, the engine and the CLI.
 */

import type { DateTime } from 'luxon';

/**
 * One daily observation. `date` is a UTC calendar day (start of day).
 */
export interface PriceSample {
  readonly date: DateTime;
  readonly price: number;
}

/**
 * Samples sorted ascending by date. Duplicate dates are allowed.
 */
export type PriceSeries = ReadonlyArray<PriceSample>;

/**
 * Parameters of one fixed-withdrawal strategy.
 */
export interface StrategyConfig {
  /** Currency spent on shares at the starting date */
  readonly initialCapital: number;
  /** Number of consecutive periods that must be funded */
  readonly numRuns: number;
  /** Length of one period in calendar years */
  readonly yearsPerRun: number;
  /** Annual inflation multiplier, e.g. 1.016 */
  readonly inflationRate: number;
  /** Living cost per year at today's prices */
  readonly annualCostOfLiving: number;
}

/**
 * Terminal classification of one simulation.
 * - success: every period reached its target
 * - failed: some period never reached its target
 * - not_applicable: the series ends before some period boundary
 */
export type Outcome = 'success' | 'failed' | 'not_applicable';

/**
 * Tally over every starting index of a backtest.
 */
export interface AggregateResult {
  successCount: number;
  failedCount: number;
  naCount: number;
  total: number;
  /** successCount / (successCount + failedCount), null when nothing was decided */
  successRate: number | null;
}
