import { describe, expect, it } from '@jest/globals';
import { ChartPayload, StatSummary } from '../../assessmentTypes.js';
import { formatSummary, renderChart, zToColumn } from '../../chart/render.js';
import { buildReferenceLines } from '../../chart/zScoreChart.js';
import { computeZScore } from '../../analysis/zScore.js';

const summary: StatSummary = {
  metricColumn: 'PL',
  count: 3,
  mean: 20,
  std: 10,
  ageRange: { min: 20, max: 30 },
  iqRange: { min: 90, max: 110 },
};

describe('zToColumn', () => {
  it('maps the range onto the track', () => {
    expect(zToColumn(-3, [-3, 3], 7)).toBe(0);
    expect(zToColumn(0, [-3, 3], 7)).toBe(3);
    expect(zToColumn(3, [-3, 3], 7)).toBe(6);
  });

  it('clamps values outside the range', () => {
    expect(zToColumn(10, [-3, 3], 7)).toBe(6);
    expect(zToColumn(-10, [-3, 3], 7)).toBe(0);
  });
});

describe('renderChart', () => {
  it('draws one row per bar with reference marks', () => {
    const payload: ChartPayload = {
      bars: [
        { label: 'PL', observedValue: 30, zScore: 1, band: 'average', color: '#7F8C8D', highlighted: true },
        { label: 'EBPM', observedValue: 5, zScore: -1.5, band: 'below average', color: '#E8A33D', highlighted: false },
      ],
      referenceLines: buildReferenceLines(),
      yRange: [-3, 3],
      annotations: ['N = 3'],
    };
    expect(renderChart(payload, 7).split('\n')).toEqual([
      '              -3    3',
      '> PL     1.00  ::##:  average',
      '  EBPM  -1.50  :##::  below average',
      'N = 3',
    ]);
  });

  it('says so when there is nothing to draw', () => {
    const payload: ChartPayload = { bars: [], referenceLines: [], yRange: [-3, 3], annotations: [] };
    expect(renderChart(payload, 7).split('\n')[1]).toBe('  (no bars to draw)');
  });
});

describe('formatSummary', () => {
  it('prints count, mean and SD', () => {
    expect(formatSummary(summary)).toBe('PL: N = 3 | mean = 20.00 | SD = 10.00');
  });

  it('adds the z-score and band when scored', () => {
    expect(formatSummary(summary, computeZScore(30, summary))).toBe('PL: N = 3 | mean = 20.00 | SD = 10.00 | z = 1.00 (average)');
  });
});
