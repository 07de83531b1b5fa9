#!/usr/bin/env tsx

/**
 * retirecheck CLI Entry Point
 *
 * Command modules register themselves in commandRegistry when imported (side effects).
 * registerXCommands functions add Commander options and wire them to executeValidated(),
 * which uses handlers from the registry.
 */

import { program } from 'commander';
import { handleError } from '../core/error-handler.js';
import { registerBacktestCommands } from '../commands/backtest.js';

program
  .name('retirecheck')
  .description('Backtest fixed-withdrawal retirement strategies against historical prices')
  .version('1.0.0');

registerBacktestCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  await program.parseAsync();
}

main().catch((error: unknown) => {
  const message = handleError(error);
  console.error(`Error: ${message}`);
  process.exit(1);
});
