/**
 * Package-aware Logging
 * =====================
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@retirecheck/utils';
 *
 * const logger = createPackageLogger('@retirecheck/backtest');
 * logger.info('Backtest started', { samples: 1024 });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Get all registered package loggers
 */
export function getPackageLoggers(): Map<string, Logger> {
  return new Map(packageLoggers);
}

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log performance metric
   */
  static performance(
    logger: Logger,
    operation: string,
    duration: number,
    success: boolean,
    context?: LogContext
  ): void {
    logger.info('Performance Metric', { operation, duration, success, ...context });
  }
}
