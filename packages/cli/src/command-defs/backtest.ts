import { z } from 'zod';

/**
 * Backtest run schema
 *
 * Strategy fields carry no defaults here: a missing flag falls back to the
 * config file, then to the built-in defaults of @retirecheck/core.
 */
export const backtestRunSchema = z.object({
  file: z.string().min(1).default('./GSPC.csv'),
  config: z.string().min(1).optional(),
  capital: z.coerce.number().int().positive().optional(),
  runs: z.coerce.number().int().min(1).optional(),
  yearsPerRun: z.coerce.number().int().min(1).optional(),
  inflationRate: z.coerce.number().finite().min(1).optional(),
  costPerYear: z.coerce.number().int().min(0).optional(),
  priceColumn: z.string().min(1).default('High'),
  verbose: z.boolean().default(false),
  format: z.enum(['json', 'table', 'csv']).default('table'),
});

export type BacktestRunArgs = z.infer<typeof backtestRunSchema>;
