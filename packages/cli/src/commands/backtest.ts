/**
 * Backtest Commands
 */

import type { Command } from 'commander';
import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { coerceBoolean, coerceNumber } from '../core/coerce.js';
import { commandRegistry } from '../core/command-registry.js';
import type { CommandContext } from '../core/command-context.js';
import { backtestRunSchema, type BacktestRunArgs } from '../command-defs/backtest.js';
import { runBacktestHandler } from '../handlers/backtest/run-backtest.js';

export interface RegisterBacktestOptions {
  /** Context factory; defaults to a fresh CommandContext per invocation */
  context?: () => CommandContext;
  /** Replaces the default die() so tests can observe failures */
  onError?: (e: unknown) => never;
}

/**
 * Register backtest commands
 */
export function registerBacktestCommands(
  program: Command,
  options: RegisterBacktestOptions = {}
): void {
  // Check if command already exists to avoid duplicate registration
  if (program.commands.find((cmd) => cmd.name() === 'backtest')) {
    return;
  }

  const backtestCmd = program
    .command('backtest')
    .description('Backtest fixed-withdrawal retirement strategies');

  const runCmd = backtestCmd
    .command('run')
    .description('Simulate the strategy from every starting date in the price file')
    .option('-f, --file <path>', 'Price CSV file', './GSPC.csv')
    .option('-c, --capital <number>', 'Initial capital (default: 333333)')
    .option('-r, --runs <number>', 'Number of withdrawal periods (default: 5)')
    .option('-y, --years-per-run <number>', 'Years per period (default: 10)')
    .option('-i, --inflation-rate <number>', 'Annual inflation multiplier (default: 1.016)')
    .option('-l, --cost-per-year <number>', 'Annual cost of living (default: 16666)')
    .option('-v, --verbose', 'Trace every simulation to stdout')
    .option('--config <path>', 'YAML/JSON file with strategy parameters')
    .option('--price-column <name>', 'CSV column holding the price', 'High')
    .option('--format <format>', 'Output format (json, table, csv)', 'table');

  defineCommand(runCmd, {
    name: 'run',
    packageName: 'backtest',
    coerce: (raw) => ({
      ...raw,
      capital: coerceNumber(raw.capital, 'capital'),
      runs: coerceNumber(raw.runs, 'runs'),
      yearsPerRun: coerceNumber(raw.yearsPerRun, 'years-per-run'),
      inflationRate: coerceNumber(raw.inflationRate, 'inflation-rate'),
      costPerYear: coerceNumber(raw.costPerYear, 'cost-per-year'),
      verbose: coerceBoolean(raw.verbose, 'verbose') ?? false,
    }),
    onError: options.onError ?? die,
    context: options.context,
  });
}

const runCommand: CommandDefinition<BacktestRunArgs> = {
  name: 'run',
  description: 'Simulate the strategy from every starting date in the price file',
  schema: backtestRunSchema,
  handler: runBacktestHandler,
  examples: [
    'retirecheck backtest run -f ./GSPC.csv',
    'retirecheck backtest run -f ./GSPC.csv -c 500000 -r 3 -y 10 -l 20000',
    'retirecheck backtest run --config strategy.yaml --format json',
  ],
};

const backtestModule: PackageCommandModule = {
  packageName: 'backtest',
  description: 'Backtest fixed-withdrawal retirement strategies',
  commands: [runCommand],
};

commandRegistry.registerPackage(backtestModule);
