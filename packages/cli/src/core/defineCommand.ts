/**
 * Standard Command Wrapper
 *
 * Provides a mechanical pattern for CLI commands:
 * - Commander owns flags & parsing
 * - Wrapper owns: value coercion, schema validation, error formatting, handler invocation
 *
 * Uses commandDef.schema from the registry as the single source of truth for validation.
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import { executeValidated } from './execute.js';
import { commandRegistry } from './command-registry.js';
import { NotFoundError } from '@retirecheck/utils';
import { validateAndCoerceArgs } from './validation-pipeline.js';
import { CommandContext } from './command-context.js';

type CoerceFn = (raw: Record<string, unknown>) => Record<string, unknown>;

export type DefineCommandArgs = {
  name: string;
  packageName: string;
  // Value coercion only (numbers/booleans), NOT key renaming
  coerce?: CoerceFn;
  onError?: (e: unknown) => never;
  // Tests pass a context with service overrides
  context?: () => CommandContext;
};

/**
 * Standard command wiring:
 * - Commander parses flags -> camelCase properties
 * - Optional coerce() for value parsing only
 * - Validates using commandDef.schema from registry
 * - Uses executeValidated() for context, handler call and formatting
 */
export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  cmd.name(args.name);

  cmd.action(async () => {
    try {
      const commandDef = commandRegistry.getCommand(args.packageName, args.name);
      if (!commandDef) {
        throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
      }

      // Commander gives camelCase keys already
      const rawOpts = cmd.opts();
      const coerced = args.coerce ? args.coerce(rawOpts) : rawOpts;

      const validated = validateAndCoerceArgs(commandDef.schema, coerced);

      const ctx = args.context ? args.context() : new CommandContext();
      await executeValidated(commandDef, validated, ctx);
    } catch (e) {
      if (args.onError) {
        args.onError(e);
      }
      throw e;
    }
  });

  return cmd;
}
