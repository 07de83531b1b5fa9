import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '@retirecheck/utils';
import { normalizeOptions, parseArguments } from '../../../src/core/argument-parser.js';
import { validateAndCoerceArgs } from '../../../src/core/validation-pipeline.js';

describe('normalizeOptions', () => {
  it('drops undefined and null values', () => {
    expect(normalizeOptions({ a: undefined, b: null, c: 1 })).toEqual({ c: 1 });
  });

  it('converts boolean and canonical number strings', () => {
    expect(normalizeOptions({ verbose: 'true', quiet: 'false', runs: '5', rate: '1.016' })).toEqual({
      verbose: true,
      quiet: false,
      runs: 5,
      rate: 1.016,
    });
  });

  it('leaves other strings alone', () => {
    expect(normalizeOptions({ file: './GSPC.csv', padded: '007', empty: '' })).toEqual({
      file: './GSPC.csv',
      padded: '007',
      empty: '',
    });
  });

  it('never renames keys', () => {
    expect(Object.keys(normalizeOptions({ yearsPerRun: '10' }))).toEqual(['yearsPerRun']);
  });
});

describe('parseArguments', () => {
  const schema = z.object({ runs: z.number().int().min(1), file: z.string() });

  it('returns the parsed value', () => {
    expect(parseArguments(schema, { runs: 2, file: 'a.csv' })).toEqual({ runs: 2, file: 'a.csv' });
  });

  it('lists every issue with its path', () => {
    expect(() => parseArguments(schema, { runs: 0 })).toThrow(ValidationError);
    expect(() => parseArguments(schema, { runs: 0 })).toThrow(
      'Invalid arguments:\n  runs: Number must be greater than or equal to 1\n  file: Required'
    );
  });
});

describe('validateAndCoerceArgs', () => {
  it('normalizes before validating', () => {
    const schema = z.object({ runs: z.number(), verbose: z.boolean() });
    expect(validateAndCoerceArgs(schema, { runs: '3', verbose: 'true', extra: undefined })).toEqual({
      runs: 3,
      verbose: true,
    });
  });
});
