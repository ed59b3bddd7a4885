import { describe, it, expect } from 'vitest';
import { parseCount } from '../../../src/cli/context.js';
import { InvalidArgumentError } from '../../../src/errors/store.js';

describe('parseCount', () => {
  it('accepts plain non-negative integers', () => {
    expect(parseCount('0', '--top')).toBe(0);
    expect(parseCount('12', '--top')).toBe(12);
  });

  it('rejects an empty value', () => {
    expect(() => parseCount('', '--top')).toThrow('--top must be a non-negative integer, got ""');
  });

  it('rejects exponent, signed, fractional and padded forms', () => {
    for (const value of ['1e2', '-1', '+3', '2.0', ' 4', '0x10']) {
      expect(() => parseCount(value, 'index')).toThrow(InvalidArgumentError);
    }
  });

  it('rejects values beyond the safe integer range', () => {
    expect(() => parseCount('9007199254740993', '--top')).toThrow(InvalidArgumentError);
  });
});
