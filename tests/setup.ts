/**
 * Root test setup file
 *
 * Runs before every test file. Keeps the console quiet so tests can assert on
 * what commands print.
 */

import { vi } from 'vitest';

process.env.NODE_ENV = 'test';
// Winston writes through the console; keep its output out of console assertions
process.env.LOG_CONSOLE = 'false';

global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
