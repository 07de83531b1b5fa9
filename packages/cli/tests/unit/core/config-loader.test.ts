/**
 * Config Loader Tests
 *
 * YAML/JSON config loading, CLI override merging, and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ValidationError } from '@retirecheck/utils';
import { partialStrategyConfigSchema } from '@retirecheck/core';
import { detectConfigFormat, deepMerge, loadConfig } from '../../../src/core/config-loader.js';

const TEST_DIR = join(process.cwd(), '.test-config-loader');

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('detectConfigFormat', () => {
  it('detects YAML from .yaml and .yml', () => {
    expect(detectConfigFormat('strategy.yaml')).toBe('yaml');
    expect(detectConfigFormat('strategy.YML')).toBe('yaml');
  });

  it('defaults to JSON', () => {
    expect(detectConfigFormat('strategy.json')).toBe('json');
    expect(detectConfigFormat('strategy')).toBe('json');
  });
});

describe('deepMerge', () => {
  it('lets overrides win', () => {
    expect(deepMerge({ a: 1, b: 2 }, { b: 3, c: 4 })).toEqual({ a: 1, b: 3, c: 4 });
  });

  it('merges nested objects', () => {
    expect(deepMerge({ a: { x: 1, y: 2 } }, { a: { y: 3 } })).toEqual({ a: { x: 1, y: 3 } });
  });

  it('skips undefined overrides and replaces arrays', () => {
    expect(deepMerge({ a: 1, list: [1, 2] }, { a: undefined, list: [3] })).toEqual({
      a: 1,
      list: [3],
    });
  });
});

describe('loadConfig', () => {
  it('loads YAML and applies overrides', async () => {
    const path = join(TEST_DIR, 'strategy.yaml');
    writeFileSync(path, 'numRuns: 2\nannualCostOfLiving: 10\n');

    const config = await loadConfig(path, partialStrategyConfigSchema, {
      numRuns: 4,
      initialCapital: undefined,
    });

    expect(config).toEqual({ numRuns: 4, annualCostOfLiving: 10 });
  });

  it('loads JSON', async () => {
    const path = join(TEST_DIR, 'strategy.json');
    writeFileSync(path, JSON.stringify({ inflationRate: 1.03 }));

    await expect(loadConfig(path, partialStrategyConfigSchema)).resolves.toEqual({
      inflationRate: 1.03,
    });
  });

  it('rejects a config that fails the schema', async () => {
    const path = join(TEST_DIR, 'strategy.yaml');
    writeFileSync(path, 'numRuns: 0\n');

    await expect(loadConfig(path, partialStrategyConfigSchema)).rejects.toThrow(
      'Config validation failed: numRuns: Number must be greater than or equal to 1'
    );
  });

  it('rejects a file that is not an object', async () => {
    const path = join(TEST_DIR, 'list.yaml');
    writeFileSync(path, '- 1\n- 2\n');

    await expect(loadConfig(path, z.object({}))).rejects.toThrow(
      `Failed to load config from ${path}: YAML config must be an object`
    );
  });

  it('rejects a missing file', async () => {
    const path = join(TEST_DIR, 'missing.json');

    await expect(loadConfig(path, z.object({}))).rejects.toThrow(ValidationError);
  });
});
