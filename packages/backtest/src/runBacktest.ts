/**
 * Run Backtest - Single linear pass over every starting date
 *
 * 1. Validate: reject an empty series and an invalid config up front
 * 2. Simulate: one independent simulation per starting index (forward-looking only)
 * 3. Tally: classify each outcome
 *
 * No retries, no alternative paths. Deterministic for a given series and config.
 */

import {
  parseStrategyConfig,
  type AggregateResult,
  type Outcome,
  type PriceSeries,
  type StrategyConfig,
  type StrategyConfigInput,
} from '@retirecheck/core';
import { InputError } from '@retirecheck/utils';
import { simulatePeriods } from './engine/period-simulator.js';
import type { BacktestTraceSink } from './trace/types.js';
import { logger } from './logger.js';

export interface RunBacktestOptions {
  /** Receives per-simulation trace events (verbose output) */
  trace?: BacktestTraceSink;
  /** Called after each starting index with its outcome */
  onOutcome?: (startIndex: number, outcome: Outcome) => void;
}

/**
 * Evaluate one strategy against every starting date of `series`.
 *
 * @throws InputError when the series is empty
 * @throws ValidationError when the config is invalid
 */
export function runBacktest(
  configInput: StrategyConfig | StrategyConfigInput,
  series: PriceSeries,
  options: RunBacktestOptions = {}
): AggregateResult {
  if (series.length === 0) {
    throw new InputError('no input data: the price series is empty');
  }
  const config = parseStrategyConfig(configInput);

  logger.debug('Starting backtest', { samples: series.length, ...config });

  const tally = createTally();
  for (let i = 0; i < series.length; i++) {
    const outcome = simulatePeriods(config, series, i, options.trace);
    recordOutcome(tally, outcome);
    options.onOutcome?.(i, outcome);
  }

  const result = finalizeTally(tally);
  logger.debug('Backtest complete', { ...result });
  return result;
}

interface Tally {
  successCount: number;
  failedCount: number;
  naCount: number;
}

function createTally(): Tally {
  return { successCount: 0, failedCount: 0, naCount: 0 };
}

function recordOutcome(tally: Tally, outcome: Outcome): void {
  switch (outcome) {
    case 'success':
      tally.successCount++;
      break;
    case 'failed':
      tally.failedCount++;
      break;
    case 'not_applicable':
      tally.naCount++;
      break;
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unhandled outcome: ${String(unreachable)}`);
    }
  }
}

function finalizeTally(tally: Tally): AggregateResult {
  return {
    ...tally,
    total: tally.successCount + tally.failedCount + tally.naCount,
    successRate: computeSuccessRate(tally.successCount, tally.failedCount),
  };
}

/**
 * Share of decided simulations that succeeded; null when none were decided.
 */
export function computeSuccessRate(successCount: number, failedCount: number): number | null {
  const decided = successCount + failedCount;
  return decided === 0 ? null : successCount / decided;
}

/**
 * One-line summary: `success 12, failed: 3, N/A: 5, successful rate 0.800000`
 */
export function formatBacktestSummary(result: AggregateResult): string {
  const rate = result.successRate === null ? 'N/A' : result.successRate.toFixed(6);
  return (
    `success ${result.successCount}, failed: ${result.failedCount}, ` +
    `N/A: ${result.naCount}, successful rate ${rate}`
  );
}
