/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Command definition structure
 */
export interface CommandDefinition<TArgs = unknown> {
  /**
   * Command name (e.g., 'run')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;

  /**
   * Command handler function. Receives args already validated by `schema`.
   */
  handler(args: TArgs, ctx: CommandContext): Promise<unknown> | unknown;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'backtest')
   */
  packageName: string;

  description: string;

  commands: CommandDefinition[];
}

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table' | 'csv';

/**
 * Result of `backtest run`: the inputs that produced it plus the tally
 */
export interface BacktestReport {
  file: string;
  samples: number;
  firstDate: string | null;
  lastDate: string | null;
  initialCapital: number;
  numRuns: number;
  yearsPerRun: number;
  inflationRate: number;
  annualCostOfLiving: number;
  successCount: number;
  failedCount: number;
  naCount: number;
  total: number;
  successRate: number | null;
  summary: string;
}
