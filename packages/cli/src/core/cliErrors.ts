/**
 * Terminal error path for commander actions
 */

import { handleError } from './error-handler.js';

/**
 * Print a user-facing error and exit with status 1
 */
export function die(error: unknown): never {
  const message = handleError(error);
  console.error(`Error: ${message}`);
  process.exit(1);
}
