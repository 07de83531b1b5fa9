/**
 * @retirecheck/core
 *
 * Foundational domain types and the strategy configuration schema.
 */

export type {
  PriceSample,
  PriceSeries,
  StrategyConfig,
  Outcome,
  AggregateResult,
} from './types.js';

export {
  DEFAULT_STRATEGY_CONFIG,
  strategyConfigSchema,
  partialStrategyConfigSchema,
  parseStrategyConfig,
  type StrategyConfigInput,
} from './config.js';
