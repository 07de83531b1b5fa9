/**
 * @retirecheck/utils - Shared utilities package
 *
 * Exports only:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

// Centralized logging system
export { logger, Logger, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

// Package-aware logging
export { createPackageLogger, getPackageLoggers, LogHelpers } from './logging/index.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
