import { describe, expect, it } from '@jest/globals';
import { StatSummary, ZBand } from '../../assessmentTypes.js';
import { classifyZScore, computeZScore, DEFAULT_Z_BANDS } from '../../analysis/zScore.js';
import { ValidationError } from '../../errors.js';
import { errorCode } from '../fixtures.js';

function summary(overrides: Partial<StatSummary> = {}): StatSummary {
  return {
    metricColumn: 'PL',
    count: 10,
    mean: 100,
    std: 15,
    ageRange: { min: 18, max: 120 },
    iqRange: { min: 70, max: 180 },
    ...overrides,
  };
}

describe('computeZScore', () => {
  it('scores one SD above the mean as 1', () => {
    const result = computeZScore(115, summary());
    expect(result.zScore).toBeCloseTo(1, 9);
    expect(result.band.label).toBe('average');
    expect(result.metricColumn).toBe('PL');
    expect(result.observedValue).toBe(115);
  });

  it('scores two SD below the mean as -2', () => {
    const result = computeZScore(70, summary());
    expect(result.zScore).toBeCloseTo(-2, 9);
    expect(result.band.label).toBe('below average');
  });

  it('refuses a zero standard deviation', () => {
    const degenerate = summary({ count: 5, std: 0 });
    expect(() => computeZScore(100, degenerate)).toThrow(ValidationError);
    expect(() => computeZScore(100, degenerate)).toThrow('standard deviation is zero for PL: all 5 matching values are identical');
  });

  it('refuses a missing or non-numeric observed value', () => {
    expect(errorCode(() => computeZScore(undefined, summary()))).toBe('INVALID_OBSERVED_VALUE');
    expect(errorCode(() => computeZScore('115', summary()))).toBe('INVALID_OBSERVED_VALUE');
    expect(errorCode(() => computeZScore(NaN, summary()))).toBe('INVALID_OBSERVED_VALUE');
  });

  it('builds a one-bar chart against the reference lines', () => {
    const { chart } = computeZScore(115, summary());
    expect(chart.bars).toEqual([
      { label: 'PL', observedValue: 115, zScore: 1, band: 'average', color: '#7F8C8D', highlighted: true },
    ]);
    expect(chart.referenceLines.map(line => [line.zScore, line.value])).toEqual([
      [-2, 70],
      [-1, 85],
      [0, 100],
      [1, 115],
      [2, 130],
    ]);
    expect(chart.yRange).toEqual([-3, 3]);
    expect(chart.annotations).toEqual(['N = 10', 'Age range: 18 ~ 120', 'IQ range: 70 ~ 180']);
  });
});

describe('classifyZScore', () => {
  it.each([
    { z: -3.5, label: 'impaired' },
    { z: -2.01, label: 'impaired' },
    { z: -2, label: 'below average' },
    { z: -1.5, label: 'below average' },
    { z: -1, label: 'average' },
    { z: 0, label: 'average' },
    { z: 1, label: 'average' },
    { z: 1.5, label: 'above average' },
    { z: 2, label: 'above average' },
    { z: 2.5, label: 'superior' },
  ])('puts z = $z in $label', ({ z, label }) => {
    expect(classifyZScore(z).label).toBe(label);
  });

  it('accepts a custom table', () => {
    const bands: ZBand[] = [
      { label: 'low', min: -Infinity, max: 0, maxExclusive: true, color: 'red' },
      { label: 'high', min: 0, max: Infinity, color: 'green' },
    ];
    expect(classifyZScore(-0.1, bands).label).toBe('low');
    expect(classifyZScore(0, bands).label).toBe('high');
  });

  it('rejects a z that no band covers', () => {
    const bands = DEFAULT_Z_BANDS.filter(band => band.label !== 'average');
    expect(errorCode(() => classifyZScore(0, bands))).toBe('INVALID_INPUT');
  });
});
