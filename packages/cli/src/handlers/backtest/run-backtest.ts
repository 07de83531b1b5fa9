/**
 * Handler for backtest run command
 *
 * Loads the price series, resolves the strategy (defaults < config file < flags),
 * runs one simulation per starting date and reports the tally.
 */

import {
  parseStrategyConfig,
  partialStrategyConfigSchema,
  type StrategyConfig,
  type StrategyConfigInput,
} from '@retirecheck/core';
import { ConsoleTraceSink, formatBacktestSummary, runBacktest } from '@retirecheck/backtest';
import { LogHelpers, logger } from '@retirecheck/utils';
import type { CommandContext } from '../../core/command-context.js';
import { loadConfig } from '../../core/config-loader.js';
import type { BacktestRunArgs } from '../../command-defs/backtest.js';
import type { BacktestReport } from '../../types/index.js';

/**
 * Map CLI flag names onto strategy fields. Unset flags stay undefined so they
 * never mask a value from the config file.
 */
function flagOverrides(args: BacktestRunArgs): StrategyConfigInput {
  return {
    initialCapital: args.capital,
    numRuns: args.runs,
    yearsPerRun: args.yearsPerRun,
    inflationRate: args.inflationRate,
    annualCostOfLiving: args.costPerYear,
  };
}

export async function resolveStrategyConfig(args: BacktestRunArgs): Promise<StrategyConfig> {
  const overrides = flagOverrides(args);
  if (!args.config) {
    return parseStrategyConfig(overrides);
  }

  const merged = await loadConfig(args.config, partialStrategyConfigSchema, overrides);
  return parseStrategyConfig(merged);
}

export async function runBacktestHandler(
  args: BacktestRunArgs,
  ctx: CommandContext
): Promise<BacktestReport> {
  const config = await resolveStrategyConfig(args);

  const series = await ctx.services.priceSeriesLoader().load({
    source: 'csv',
    path: args.file,
    priceColumn: args.priceColumn,
  });

  const trace = args.verbose ? new ConsoleTraceSink(ctx.services.traceOutput()) : undefined;

  const startedAt = Date.now();
  const result = runBacktest(config, series, { trace });
  LogHelpers.performance(logger, 'backtest.run', Date.now() - startedAt, true, {
    samples: series.length,
  });

  return {
    file: args.file,
    samples: series.length,
    firstDate: series[0]?.date.toISODate() ?? null,
    lastDate: series[series.length - 1]?.date.toISODate() ?? null,
    ...config,
    ...result,
    summary: formatBacktestSummary(result),
  };
}
