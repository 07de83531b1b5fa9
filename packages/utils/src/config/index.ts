/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for process-wide settings.
 */

import * as path from 'path';
import { ConfigurationError } from '../errors.js';

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Load logging configuration from environment variables
 *
 * File logging is opt-in (`LOG_FILE=true`); the console transport is on unless
 * `LOG_CONSOLE=false`.
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const { LOG_LEVEL, LOG_CONSOLE, LOG_FILE, LOG_DIR, LOG_MAX_FILES, LOG_MAX_SIZE, NODE_ENV } = env;

  const level = LOG_LEVEL || (NODE_ENV === 'production' ? 'info' : 'warn');
  if (!LOG_LEVELS.includes(level)) {
    throw new ConfigurationError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${level}'`,
      'LOG_LEVEL'
    );
  }

  return {
    level,
    enableConsole: LOG_CONSOLE !== 'false',
    enableFile: LOG_FILE === 'true',
    logDir: LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: LOG_MAX_FILES || '14d',
    maxSize: LOG_MAX_SIZE || '20m',
  };
}
