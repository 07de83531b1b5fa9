/**
 * @retirecheck/cli - Command line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './core/config-loader.js';
export * from './core/coerce.js';
export { execute, executeValidated } from './core/execute.js';
export { defineCommand, type DefineCommandArgs } from './core/defineCommand.js';
export * from './types/index.js';
export { registerBacktestCommands, type RegisterBacktestOptions } from './commands/backtest.js';
export { backtestRunSchema, type BacktestRunArgs } from './command-defs/backtest.js';
export { runBacktestHandler, resolveStrategyConfig } from './handlers/backtest/run-backtest.js';
