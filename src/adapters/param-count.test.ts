import { describe, it, expect } from 'vitest';
import { parseParamCount, formatParamCount } from './param-count.js';

describe('parseParamCount', () => {
  it.each([
    // letter suffixes
    ['7b', 7_000_000_000],
    ['7B', 7_000_000_000],
    ['1.5b', 1_500_000_000],
    ['135m', 135_000_000],
    ['135M', 135_000_000],
    ['1.7b', 1_700_000_000],
    ['70b', 70_000_000_000],
    ['0b', 0],
    ['0.5b', 500_000_000],
    ['1t', 1_000_000_000_000],
    // words
    ['7 billion', 7_000_000_000],
    ['7billion', 7_000_000_000],
    ['135 million', 135_000_000],
    ['1.5 billion', 1_500_000_000],
    ['2 thousand', 2_000],
    ['500k', 500_000],
    // plain counts
    ['7,000,000,000', 7_000_000_000],
    ['135,000,000', 135_000_000],
    ['1,500', 1_500],
    // exponent notation
    ['7e9', 7_000_000_000],
    ['1e3', 1_000],
    ['1.5E9', 1_500_000_000],
    ['2e0b', 2_000_000_000],
    // terse counts read as billions
    ['7', 7_000_000_000],
    ['~7b', 7_000_000_000],
    // unparseable
    ['', 0],
    ['   ', 0],
    ['invalid', 0],
    ['.', 0],
  ])('%j → %d', (input, expected) => {
    expect(parseParamCount(input)).toBe(expected);
  });

  it('reads a bare small count as billions', () => {
    expect(parseParamCount('500')).toBe(500_000_000_000);
  });
});

describe('formatParamCount', () => {
  it.each([
    [7_000_000_000, '7B'],
    [1_500_000_000, '1.5B'],
    [135_000_000, '135M'],
    [500_000, '500K'],
    [1_000_000_000_000, '1T'],
    [42, '42'],
    [0, '0'],
  ])('%d → %s', (count, expected) => {
    expect(formatParamCount(count)).toBe(expected);
  });
});
