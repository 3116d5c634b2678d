import { describe, test, expect } from 'vitest';
import { collect, parseCount, parseList } from './args.js';
import { RcompError } from './errors.js';

describe('collect', () => {
  test('given previous values, should append', () => {
    expect(collect('b', ['a'])).toEqual(['a', 'b']);
  });
});

describe('parseList', () => {
  test('given undefined, should return empty list', () => {
    expect(parseList(undefined)).toEqual([]);
  });

  test('given repeated and comma-separated values, should flatten in order', () => {
    expect(parseList(['auth, sql-injection', 'xss'])).toEqual(['auth', 'sql-injection', 'xss']);
  });

  test('given empty segments, should drop them', () => {
    expect(parseList(['a,,b,', ' '])).toEqual(['a', 'b']);
  });
});

describe('parseCount', () => {
  test('given undefined, should return undefined', () => {
    expect(parseCount(undefined, '--budget')).toBeUndefined();
  });

  test('given digits, should return the number', () => {
    expect(parseCount('3000', '--budget')).toBe(3000);
  });

  test('given a non-integer, should throw INVALID_ARGS', () => {
    expect(() => parseCount('12k', '--budget')).toThrow(RcompError);
    expect(() => parseCount('-5', '--max-modules')).toThrow(
      'Invalid --max-modules value: "-5" — expected a non-negative integer',
    );
  });
});
