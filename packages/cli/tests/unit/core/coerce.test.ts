import { describe, it, expect } from 'vitest';
import { ValidationError } from '@retirecheck/utils';
import { coerceBoolean, coerceNumber } from '../../../src/core/coerce.js';

describe('coerceNumber', () => {
  it('passes numbers and undefined through', () => {
    expect(coerceNumber(5, 'runs')).toBe(5);
    expect(coerceNumber(undefined, 'runs')).toBeUndefined();
    expect(coerceNumber(null, 'runs')).toBeUndefined();
  });

  it('parses numeric strings', () => {
    expect(coerceNumber('333333', 'capital')).toBe(333333);
    expect(coerceNumber('1.016', 'inflation-rate')).toBe(1.016);
  });

  it('rejects non-numeric input with the flag name', () => {
    expect(() => coerceNumber('ten', 'runs')).toThrow(ValidationError);
    expect(() => coerceNumber('ten', 'runs')).toThrow('Invalid number for runs');
    expect(() => coerceNumber('', 'runs')).toThrow('Invalid number for runs');
    expect(() => coerceNumber(true, 'runs')).toThrow('Invalid number for runs');
  });
});

describe('coerceBoolean', () => {
  it.each([
    ['true', true],
    ['YES', true],
    ['on', true],
    ['1', true],
    ['false', false],
    ['no', false],
    ['off', false],
    ['0', false],
  ])('parses %j', (raw, expected) => {
    expect(coerceBoolean(raw, 'verbose')).toBe(expected);
  });

  it('passes booleans and numbers through', () => {
    expect(coerceBoolean(true, 'verbose')).toBe(true);
    expect(coerceBoolean(0, 'verbose')).toBe(false);
    expect(coerceBoolean(undefined, 'verbose')).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(() => coerceBoolean('maybe', 'verbose')).toThrow('Invalid boolean for verbose');
  });
});
