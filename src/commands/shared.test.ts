import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { collect, parsePositiveInt, parseTaskId, parseTaskIds } from './shared.js';

describe('command argument parsers', () => {
  it('should parse task ids', () => {
    expect(parseTaskId('12')).toBe(12);
    expect(parseTaskIds('3', parseTaskIds('1'))).toEqual([1, 3]);
  });

  it('should reject ids that are not positive integers', () => {
    for (const value of ['0', '-2', '1.5', 'abc', '']) {
      expect(() => parseTaskId(value)).toThrow(InvalidArgumentError);
    }
  });

  it('should reject a zero limit', () => {
    expect(parsePositiveInt('5')).toBe(5);
    expect(() => parsePositiveInt('0')).toThrow('Not a positive integer.');
  });

  it('should collect repeated options in order', () => {
    expect(collect('b', collect('a'))).toEqual(['a', 'b']);
  });
});
