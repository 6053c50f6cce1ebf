import { describe, it, expect } from 'vitest';

import {
  normalizePopulation,
  rankPercentile,
  applyPolarity,
  getPerformanceTier,
  formatScore,
  type PopulationMember,
} from '../../utils/percentileEngine';


// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function makePopulation(values: number[]): PopulationMember[] {
  return values.map((value, i) => ({ entity_id: String.fromCharCode(65 + i), value }));
}

const scores = (values: number[], polarity: 'lower_better' | 'higher_better') =>
  normalizePopulation(makePopulation(values), polarity).map(m => m.normalized_score);


// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('normalizePopulation', () => {
  it('maps [10..50] lower_better to [100, 75, 50, 25, 0]', () => {
    expect(scores([10, 20, 30, 40, 50], 'lower_better')).toEqual([100, 75, 50, 25, 0]);
  });

  it('maps [10..50] higher_better to [0, 25, 50, 75, 100]', () => {
    expect(scores([10, 20, 30, 40, 50], 'higher_better')).toEqual([0, 25, 50, 75, 100]);
  });

  it('gives the extreme value 100 under either polarity', () => {
    const values = [7, 3, 9, 1, 5];
    const lower = scores(values, 'lower_better');
    const higher = scores(values, 'higher_better');
    expect(lower[values.indexOf(1)]).toBe(100);
    expect(higher[values.indexOf(9)]).toBe(100);
  });

  it('inverting polarity inverts the score', () => {
    const values = [4, 8, 8, 15, 16, 23, 42];
    const lower = scores(values, 'lower_better');
    const higher = scores(values, 'higher_better');
    lower.forEach((score, i) => expect(score).toBe(100 - higher[i]));
  });

  it('ties share the same percentile', () => {
    const result = normalizePopulation(makePopulation([10, 10, 20]), 'lower_better');
    expect(result.map(m => m.percentile_rank)).toEqual([0, 0, 100]);
    expect(result.map(m => m.normalized_score)).toEqual([100, 100, 0]);
  });

  it('gives values tied at the best end 100 under either polarity', () => {
    expect(scores([10, 20, 20], 'higher_better')).toEqual([0, 100, 100]);
    expect(scores([10, 10, 20], 'lower_better')).toEqual([100, 100, 0]);
  });

  it('scores x as higher_better the same as −x as lower_better', () => {
    const values = [10, 20, 20, 35, 35, 35];
    const mirrored = values.map(v => -v);
    expect(scores(values, 'higher_better')).toEqual([0, 25, 25, 100, 100, 100]);
    expect(scores(mirrored, 'lower_better')).toEqual([0, 25, 25, 100, 100, 100]);
  });

  it('scores an all-equal population as 100 under either polarity', () => {
    expect(scores([5, 5, 5], 'higher_better')).toEqual([100, 100, 100]);
    expect(scores([5, 5, 5], 'lower_better')).toEqual([100, 100, 100]);
  });

  it('keeps input order', () => {
    const result = normalizePopulation(makePopulation([50, 10]), 'lower_better');
    expect(result.map(m => m.entity_id)).toEqual(['A', 'B']);
    expect(result.map(m => m.normalized_score)).toEqual([0, 100]);
  });

  it('scores a population of one as 100 (vacuous best)', () => {
    const [lower] = normalizePopulation(makePopulation([123]), 'lower_better');
    const [higher] = normalizePopulation(makePopulation([123]), 'higher_better');
    expect(lower.normalized_score).toBe(100);
    expect(higher.normalized_score).toBe(100);
    expect(lower.percentile_rank).toBe(0);
    expect(higher.percentile_rank).toBe(100);
  });

  it('returns nothing for an empty population', () => {
    expect(normalizePopulation([], 'lower_better')).toEqual([]);
  });

  it('keeps every percentile inside [0, 100]', () => {
    const result = normalizePopulation(makePopulation([3, -2, 0.5, 1e6, 3, 7]), 'higher_better');
    for (const m of result) {
      expect(m.percentile_rank).toBeGreaterThanOrEqual(0);
      expect(m.percentile_rank).toBeLessThanOrEqual(100);
    }
  });
});


// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

describe('rankPercentile', () => {
  it('counts values below over values that differ', () => {
    expect(rankPercentile(30, [10, 20, 30, 40, 50])).toBe(50);
    expect(rankPercentile(10, [10, 20, 30, 40, 50])).toBe(0);
    expect(rankPercentile(50, [10, 20, 30, 40, 50])).toBe(100);
  });

  it('leaves tied values out of both counts', () => {
    expect(rankPercentile(20, [10, 20, 20, 30])).toBe(50);
    expect(rankPercentile(20, [10, 20, 20])).toBe(100);
  });

  it('is NaN when no other value differs', () => {
    expect(rankPercentile(5, [5])).toBeNaN();
    expect(rankPercentile(5, [5, 5, 5])).toBeNaN();
  });
});

describe('applyPolarity', () => {
  it('flips lower_better only', () => {
    expect(applyPolarity(25, 'lower_better')).toBe(75);
    expect(applyPolarity(25, 'higher_better')).toBe(25);
  });
});

describe('getPerformanceTier', () => {
  it('uses 80 / 60 / 40 boundaries', () => {
    expect(getPerformanceTier(100)).toBe('excellent');
    expect(getPerformanceTier(80)).toBe('excellent');
    expect(getPerformanceTier(79.9)).toBe('good');
    expect(getPerformanceTier(60)).toBe('good');
    expect(getPerformanceTier(59.99)).toBe('regular');
    expect(getPerformanceTier(40)).toBe('regular');
    expect(getPerformanceTier(39)).toBe('critical');
  });
});

describe('formatScore', () => {
  it('shows one decimal and the unit', () => {
    expect(formatScore(87.456)).toBe('87.5pts');
    expect(formatScore(0)).toBe('0.0pts');
  });
});
