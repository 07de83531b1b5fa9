/**
 * @retirecheck/backtest - Fixed-withdrawal backtesting engine
 *
 * Day Locator -> Period Simulator -> Backtest Aggregator.
 * Pure and synchronous; tracing goes through an injected sink.
 */

export * from './time/index.js';
export * from './trace/index.js';
export {
  simulatePeriods,
  computeRunTarget,
  type RunTarget,
} from './engine/period-simulator.js';
export {
  runBacktest,
  computeSuccessRate,
  formatBacktestSummary,
  type RunBacktestOptions,
} from './runBacktest.js';
