import { describe, it, expect } from 'vitest';

import type { MetricRecord, MetricWindow } from '../../types/ranking';
import { createEngineConfig } from '../config';
import {
  computeSubMetrics,
  consecutiveDifferences,
  mean,
  rateOfChange,
  sampleStd,
} from '../subMetrics';


// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/** `values[i]` observed on 2026-03-(days[i]) */
function makeWindow(values: number[], days?: number[]): MetricWindow {
  const records: MetricRecord[] = values.map((raw_value, i) => ({
    entity_id: 'EQ-1',
    area_id: 'CPLOAD',
    date: `2026-03-${String(days ? days[i] : i + 1).padStart(2, '0')}`,
    raw_value,
  }));
  return { entity_id: 'EQ-1', area_id: 'CPLOAD', records };
}

const config = createEngineConfig('cp', { directions: { CPLOAD: 'lower_better' } });


// ═══════════════════════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════════════════════

describe('statistics', () => {
  it('mean', () => {
    expect(mean([1, 2, 3])).toBe(2);
    expect(mean([])).toBeNaN();
  });

  it('sample standard deviation uses n − 1', () => {
    expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 10);
    expect(sampleStd([10, 12, 14])).toBe(2);
  });

  it('the deviation of one sample is 0', () => {
    expect(sampleStd([5])).toBe(0);
    expect(sampleStd([])).toBe(0);
  });

  it('differences skip missing days', () => {
    const window = makeWindow([10, 12, 15, 11], [1, 2, 4, 5]);
    expect(consecutiveDifferences(window.records)).toEqual([2, -4]);
  });

  it('rate of change needs a pair of consecutive days', () => {
    expect(rateOfChange(makeWindow([10]))).toBeNull();
    expect(rateOfChange(makeWindow([10, 30], [1, 3]))).toBeNull();
    expect(rateOfChange(makeWindow([10, 30]))).toBe(0);
  });
});


// ═══════════════════════════════════════════════════════════════════════════════
// SUB-METRICS
// ═══════════════════════════════════════════════════════════════════════════════

describe('computeSubMetrics', () => {
  it('computes all three kinds with scale factors applied', () => {
    const result = computeSubMetrics(makeWindow([10, 12, 14]), config);

    expect(result).toEqual([
      { entity_id: 'EQ-1', area_id: 'CPLOAD', metric_kind: 'fill', raw_value: 12, scaled_value: 12 },
      { entity_id: 'EQ-1', area_id: 'CPLOAD', metric_kind: 'instability', raw_value: 2, scaled_value: 2000 },
      { entity_id: 'EQ-1', area_id: 'CPLOAD', metric_kind: 'rate_of_change', raw_value: 0, scaled_value: 0 },
    ]);
  });

  it('a single observation yields fill and a zero instability only', () => {
    const result = computeSubMetrics(makeWindow([5]), config);
    expect(result.map(s => s.metric_kind)).toEqual(['fill', 'instability']);
    expect(result[1].raw_value).toBe(0);
  });

  it('respects configured minimum depths', () => {
    const deep = createEngineConfig('cp', {
      directions: { CPLOAD: 'lower_better' },
      min_samples: { fill: 1, instability: 3, rate_of_change: 3 },
    });
    expect(computeSubMetrics(makeWindow([1, 2]), deep).map(s => s.metric_kind)).toEqual(['fill']);
  });

  it('an empty window yields nothing', () => {
    expect(computeSubMetrics({ entity_id: 'EQ-1', area_id: 'CPLOAD', records: [] }, config)).toEqual([]);
  });
});
