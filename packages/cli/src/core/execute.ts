/**
 * Universal Command Executor
 *
 * Handles the universal parts of running a command:
 * - Normalize options
 * - Parse arguments (Zod validation)
 * - Create context (services)
 * - Call handler
 * - Format output
 * - Error handling
 */

import { formatOutput } from './output-formatter.js';
import { handleError } from './error-handler.js';
import { CommandContext } from './command-context.js';
import { normalizeOptions, parseArguments } from './argument-parser.js';
import type { CommandDefinition, OutputFormat } from '../types/index.js';
import { logger } from '@retirecheck/utils';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'csv'];

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format is a CLI concern; handlers never read it.
 */
function resolveFormat(args: unknown): OutputFormat {
  return isRecord(args) && isOutputFormat(args.format) ? args.format : 'table';
}

/**
 * Execute a command definition with pre-validated arguments
 *
 * Use this when arguments have already been validated (e.g., from defineCommand).
 * Skips normalization and validation steps.
 */
export async function executeValidated<TArgs>(
  commandDef: CommandDefinition<TArgs>,
  validatedArgs: TArgs,
  ctx: CommandContext = new CommandContext()
): Promise<void> {
  try {
    const format = resolveFormat(validatedArgs);

    logger.debug('Executing command', { command: commandDef.name, format });

    // Call handler (pure use-case function)
    const result = await commandDef.handler(validatedArgs, ctx);

    console.log(formatOutput(result, format));
  } catch (error) {
    const message = handleError(error, { command: commandDef.name });
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}

/**
 * Execute a command definition with raw options
 *
 * This is the entry point for raw Commander.js options.
 * It normalizes and validates arguments before calling the handler.
 *
 * For pre-validated arguments, use executeValidated() instead.
 */
export async function execute<TArgs>(
  commandDef: CommandDefinition<TArgs>,
  rawOptions: Record<string, unknown>,
  ctx?: CommandContext
): Promise<void> {
  let args: TArgs;
  try {
    args = parseArguments(commandDef.schema, normalizeOptions(rawOptions));
  } catch (error) {
    const message = handleError(error, { command: commandDef.name });
    console.error(`Error: ${message}`);
    process.exitCode = 1;
    return;
  }

  await executeValidated(commandDef, args, ctx);
}
