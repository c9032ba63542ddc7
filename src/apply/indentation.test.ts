import { describe, it, expect } from 'vitest';
import { extractIndent, nestIndent, wrapLine, wrapWords } from './indentation.js';

describe('extractIndent', () => {
  it('should return the leading run of spaces and tabs', () => {
    expect(extractIndent('    def f(x):')).toBe('    ');
    expect(extractIndent('\t\tclass A:')).toBe('\t\t');
    expect(extractIndent(' \t x = 1')).toBe(' \t ');
  });

  it('should return empty string for unindented and blank lines', () => {
    expect(extractIndent('import os')).toBe('');
    expect(extractIndent('')).toBe('');
  });

  it('should treat a whitespace-only line as all prefix', () => {
    expect(extractIndent('   ')).toBe('   ');
  });
});

describe('nestIndent', () => {
  it('should default to 4 spaces', () => {
    expect(nestIndent('')).toBe('    ');
  });

  it('should add 2 spaces to a 2-space prefix', () => {
    expect(nestIndent('  ')).toBe('    ');
    expect(nestIndent('      ')).toBe('        ');
  });

  it('should add 4 spaces to a multiple of 4', () => {
    expect(nestIndent('    ')).toBe('        ');
    expect(nestIndent('        ')).toBe('            ');
  });

  it('should add a tab when the prefix contains one', () => {
    expect(nestIndent('\t')).toBe('\t\t');
    expect(nestIndent('  \t')).toBe('  \t\t');
  });

  it('should add 4 spaces to odd widths', () => {
    expect(nestIndent(' ')).toBe('     ');
    expect(nestIndent('   ')).toBe('       ');
  });
});

describe('wrapWords', () => {
  it('should fill lines up to the width', () => {
    expect(wrapWords('aa bb cc dd', 5)).toEqual(['aa bb', 'cc dd']);
  });

  it('should give an over-long word its own line', () => {
    expect(wrapWords('a abcdefgh b', 4)).toEqual(['a', 'abcdefgh', 'b']);
  });
});

describe('wrapLine', () => {
  it('should leave lines within the limit alone', () => {
    const line = `    ${'x'.repeat(75)}`;
    expect(wrapLine(line)).toEqual([line]);
  });

  it('should count the indentation and keep it on continuation lines', () => {
    const line = `    ${Array(20).fill('word').join(' ')}`;
    expect(wrapLine(line)).toEqual([
      `    ${Array(15).fill('word').join(' ')}`,
      `    ${Array(5).fill('word').join(' ')}`,
    ]);
  });
});
