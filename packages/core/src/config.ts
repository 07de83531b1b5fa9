/**
 * Strategy configuration schema and defaults
 */

import { z } from 'zod';
import { ValidationError } from '@retirecheck/utils';
import type { StrategyConfig } from './types.js';

export const DEFAULT_STRATEGY_CONFIG: StrategyConfig = Object.freeze({
  initialCapital: 333333,
  numRuns: 5,
  yearsPerRun: 10,
  inflationRate: 1.016,
  annualCostOfLiving: 16666,
});

const strategyConfigShape = {
  initialCapital: z.number().int().positive(),
  numRuns: z.number().int().min(1),
  yearsPerRun: z.number().int().min(1),
  // 1.0 means no inflation; deflationary multipliers are rejected
  inflationRate: z.number().finite().min(1),
  annualCostOfLiving: z.number().int().min(0),
};

export const strategyConfigSchema = z.object({
  initialCapital: strategyConfigShape.initialCapital.default(DEFAULT_STRATEGY_CONFIG.initialCapital),
  numRuns: strategyConfigShape.numRuns.default(DEFAULT_STRATEGY_CONFIG.numRuns),
  yearsPerRun: strategyConfigShape.yearsPerRun.default(DEFAULT_STRATEGY_CONFIG.yearsPerRun),
  inflationRate: strategyConfigShape.inflationRate.default(DEFAULT_STRATEGY_CONFIG.inflationRate),
  annualCostOfLiving: strategyConfigShape.annualCostOfLiving.default(
    DEFAULT_STRATEGY_CONFIG.annualCostOfLiving
  ),
});

/**
 * Same fields, every one optional and without defaults. Used for config files
 * and CLI overrides that are merged before the final parse.
 */
export const partialStrategyConfigSchema = z.object(strategyConfigShape).partial().strict();

export type StrategyConfigInput = z.input<typeof strategyConfigSchema>;

/**
 * Validate and freeze a strategy config, filling defaults for missing fields.
 *
 * @throws ValidationError listing every invalid field
 */
export function parseStrategyConfig(input: StrategyConfigInput = {}): StrategyConfig {
  const parsed = strategyConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(`Invalid strategy config: ${issues.join('; ')}`, {
      issues: parsed.error.issues,
    });
  }
  return Object.freeze(parsed.data);
}
