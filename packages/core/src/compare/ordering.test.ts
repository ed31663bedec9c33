import { describe, it, expect } from 'vitest';
import { compareTimes, compareMeanTime, minOf, maxOf } from './ordering.js';
import type { BenchmarkResult } from '../types/result.js';

function makeResult(command: string, mean: number): BenchmarkResult {
  return {
    command,
    mean,
    stddev: 0,
    median: mean,
    user: mean,
    system: 0,
    min: mean,
    max: mean,
  };
}

describe('compareTimes', () => {
  it('should order smaller values first', () => {
    expect(compareTimes(1, 2)).toBe(-1);
    expect(compareTimes(2, 1)).toBe(1);
    expect(compareTimes(2, 2)).toBe(0);
  });

  it('should treat NaN as equal to anything', () => {
    expect(compareTimes(Number.NaN, 1)).toBe(0);
    expect(compareTimes(1, Number.NaN)).toBe(0);
    expect(compareTimes(Number.NaN, Number.NaN)).toBe(0);
  });
});

describe('compareMeanTime', () => {
  it('should compare results by mean', () => {
    expect(compareMeanTime(makeResult('a', 0.5), makeResult('b', 1.5))).toBe(-1);
    expect(compareMeanTime(makeResult('a', 1.5), makeResult('b', 0.5))).toBe(1);
  });

  it('should keep sort order stable for equal means', () => {
    const sorted = [makeResult('x', 2), makeResult('y', 1), makeResult('z', 1)].sort(compareMeanTime);
    expect(sorted.map((r) => r.command)).toEqual(['y', 'z', 'x']);
  });
});

describe('maxOf', () => {
  it('should return the largest value', () => {
    expect(maxOf([1.0])).toBe(1.0);
    expect(maxOf([-1.0])).toBe(-1.0);
    expect(maxOf([-2.0, -1.0])).toBe(-1.0);
    expect(maxOf([-1.0, 1.0])).toBe(1.0);
    expect(maxOf([-1.0, 1.0, 0.0])).toBe(1.0);
  });

  it('should throw for an empty list', () => {
    expect(() => maxOf([])).toThrow(RangeError);
  });
});

describe('minOf', () => {
  it('should return the smallest value', () => {
    expect(minOf([1.0])).toBe(1.0);
    expect(minOf([-2.0, -1.0])).toBe(-2.0);
    expect(minOf([3.0, 0.5, 2.0])).toBe(0.5);
  });

  it('should not throw when the list contains NaN', () => {
    expect(minOf([Number.NaN, 2.0])).toBeNaN();
    expect(minOf([2.0, Number.NaN, 1.0])).toBe(1.0);
  });

  it('should throw for an empty list', () => {
    expect(() => minOf([])).toThrow('Cannot select from an empty list of values');
  });
});
