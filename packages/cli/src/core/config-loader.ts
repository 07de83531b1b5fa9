/**
 * Config Loader - Load YAML/JSON configuration files with CLI override merging
 *
 * Config-first runner pattern:
 * - Auto-detect config format (YAML/JSON) by extension
 * - Load and parse config files
 * - Deep merge CLI overrides into config
 * - Validate with Zod schema
 */

import { readFileSync } from 'fs';
import { extname } from 'path';
import * as yaml from 'js-yaml';
import type { z } from 'zod';
import { ValidationError } from '@retirecheck/utils';

export function detectConfigFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  // Default to JSON for unknown extensions
  return 'json';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (CLI overrides win)
 *
 * Rules:
 * - undefined overrides are skipped
 * - Primitives and arrays: override value replaces base value
 * - Objects: recursively merged
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }

    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? deepMerge(baseValue, value) : value;
  }

  return result;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const fileContent = readFileSync(configPath, 'utf-8');
  const format = detectConfigFormat(configPath);
  const parsed: unknown = format === 'yaml' ? yaml.load(fileContent) : JSON.parse(fileContent);

  if (!isPlainObject(parsed)) {
    throw new ValidationError(`${format.toUpperCase()} config must be an object`, {
      configPath,
      format,
    });
  }
  return parsed;
}

/**
 * Load config from YAML or JSON file, merge CLI overrides, validate.
 *
 * @throws ValidationError if the file cannot be read or the merged config is invalid
 */
export async function loadConfig<T>(
  configPath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  overrides?: Record<string, unknown>
): Promise<T> {
  let configData: Record<string, unknown>;

  try {
    configData = readConfigFile(configPath);
  } catch (error) {
    throw new ValidationError(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { configPath }
    );
  }

  if (overrides && Object.keys(overrides).length > 0) {
    configData = deepMerge(configData, overrides);
  }

  const parsed = schema.safeParse(configData);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Config validation failed: ${issues}`, {
      configPath,
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}
