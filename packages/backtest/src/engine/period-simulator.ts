/**
 * Period Simulator
 * ================
 * Simulates one retiree starting on `series[startIndex]`: buy shares with the
 * initial capital, then every `yearsPerRun` years wait for the first day whose
 * holding value covers the inflated capital plus the period's living cost,
 * and sell just enough shares to pay that cost.
 *
 * Share counts are always truncated toward zero. Money math is floating point.
 */

import type { DateTime } from 'luxon';
import type { Outcome, PriceSeries, StrategyConfig } from '@retirecheck/core';
import { addCalendarYears, locateDay } from '../time/index.js';
import type { BacktestTraceSink } from '../trace/types.js';

export interface RunTarget {
  /** inflationRate ^ ((run + 1) * yearsPerRun) */
  inflationFactor: number;
  inflatedCapital: number;
  costOfLiving: number;
  targetCapital: number;
}

/**
 * Capital that must be on hand during period `run` (0-based).
 */
export function computeRunTarget(config: StrategyConfig, run: number): RunTarget {
  const years = (run + 1) * config.yearsPerRun;
  const inflationFactor = Math.pow(config.inflationRate, years);
  const inflatedCapital = config.initialCapital * inflationFactor;
  const costOfLiving = config.annualCostOfLiving * config.yearsPerRun * inflationFactor;

  return {
    inflationFactor,
    inflatedCapital,
    costOfLiving,
    targetCapital: inflatedCapital + costOfLiving,
  };
}

/**
 * Per-invocation state. Never escapes `simulatePeriods`.
 */
interface SimulationState {
  heldShares: number;
  periodStart: DateTime;
  periodEnd: DateTime;
}

/**
 * Run every period for a single starting index.
 *
 * Only samples at or after `startIndex` are visible to the simulation.
 *
 * @throws RangeError if `startIndex` does not address a sample
 */
export function simulatePeriods(
  config: StrategyConfig,
  series: PriceSeries,
  startIndex: number,
  trace?: BacktestTraceSink
): Outcome {
  const first = series[startIndex];
  if (!Number.isInteger(startIndex) || first === undefined) {
    throw new RangeError(`startIndex ${startIndex} is outside a series of ${series.length} samples`);
  }

  const state: SimulationState = {
    heldShares: Math.floor(config.initialCapital / first.price),
    periodStart: first.date,
    periodEnd: first.date,
  };

  trace?.handle({
    type: 'simulation_start',
    startDate: first.date,
    capital: config.initialCapital,
    heldShares: state.heldShares,
  });

  const outcome = runPeriods(config, series, startIndex, state, trace);
  trace?.handle({ type: 'simulation_end', startDate: first.date, outcome });
  return outcome;
}

function runPeriods(
  config: StrategyConfig,
  series: PriceSeries,
  startIndex: number,
  state: SimulationState,
  trace?: BacktestTraceSink
): Outcome {
  for (let run = 0; run < config.numRuns; run++) {
    state.periodStart = state.periodEnd;
    state.periodEnd = addCalendarYears(state.periodStart, config.yearsPerRun);

    const startIdx = locateDay(state.periodStart, series, startIndex);
    const endIdx = locateDay(state.periodEnd, series, startIndex);
    if (startIdx === undefined || endIdx === undefined) {
      trace?.handle({ type: 'data_exhausted', run });
      return 'not_applicable';
    }

    const { costOfLiving, targetCapital } = computeRunTarget(config, run);
    const windowStart = series[startIdx];
    const windowEnd = series[endIdx];
    if (trace && windowStart && windowEnd) {
      trace.handle({
        type: 'period_target',
        run,
        periodStart: windowStart.date,
        periodEnd: windowEnd.date,
        targetCapital,
        costOfLiving,
      });
    }

    const period: PeriodWindow = { run, startIdx, endIdx, costOfLiving, targetCapital };
    if (!liquidateFirstCrossing(series, period, state, trace)) {
      trace?.handle({ type: 'period_unsatisfied', run });
      return 'failed';
    }
  }

  return 'success';
}

interface PeriodWindow {
  run: number;
  startIdx: number;
  /** Exclusive */
  endIdx: number;
  costOfLiving: number;
  targetCapital: number;
}

/**
 * Scan [startIdx, endIdx) for the first day the holding covers the target and
 * sell `floor(costOfLiving / price)` shares there.
 *
 * @returns whether the period was satisfied
 */
function liquidateFirstCrossing(
  series: PriceSeries,
  period: PeriodWindow,
  state: SimulationState,
  trace?: BacktestTraceSink
): boolean {
  const { run, startIdx, endIdx, costOfLiving, targetCapital } = period;
  for (let i = startIdx; i < endIdx; i++) {
    const sample = series[i];
    if (sample === undefined || state.heldShares * sample.price < targetCapital) {
      continue;
    }

    const soldShares = Math.floor(costOfLiving / sample.price);
    state.heldShares -= soldShares;

    trace?.handle({
      type: 'liquidation',
      run,
      date: sample.date,
      soldShares,
      price: sample.price,
      proceeds: soldShares * sample.price,
      heldShares: state.heldShares,
      capitalAfter: state.heldShares * sample.price,
    });
    return true;
  }

  return false;
}
