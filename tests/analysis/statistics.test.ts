import { describe, expect, it } from '@jest/globals';
import { computeStatistics } from '../../analysis/statistics.js';

describe('computeStatistics', () => {
  it('uses the n - 1 denominator', () => {
    const { mean, std } = computeStatistics([2, 4, 4, 4, 5, 5, 7, 9]);
    expect(mean).toBe(5);
    // sum of squares 32, 32 / 7
    expect(std).toBeCloseTo(Math.sqrt(32 / 7), 9);
  });

  it('gives two values their half-range scaled by sqrt(2)', () => {
    expect(computeStatistics([10, 30])).toEqual({ mean: 20, std: Math.sqrt(200) });
  });

  it('returns an exact zero deviation for a constant sample', () => {
    expect(computeStatistics([0.1, 0.1, 0.1])).toEqual({ mean: 0.1, std: 0 });
    expect(computeStatistics([7])).toEqual({ mean: 7, std: 0 });
  });

  it('does not reorder the input', () => {
    const values = [3, 1, 2];
    computeStatistics(values);
    expect(values).toEqual([3, 1, 2]);
  });
});
