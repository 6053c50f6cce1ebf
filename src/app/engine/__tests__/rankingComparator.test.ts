import { describe, it, expect } from 'vitest';

import type { RankingEntry } from '../../types/ranking';
import { categorize } from '../categorizer';
import { compareRankings, quantile, scoreStats, summarizeRanking } from '../rankingComparator';


// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/** Entries ranked by score, ids `${prefix}1`, `${prefix}2`, … in input order */
function makeEntries(prefix: string, scores: number[]): RankingEntry[] {
  return scores
    .map((final_score, i) => ({ entity_id: `${prefix}${i + 1}`, final_score }))
    .sort((a, b) => b.final_score - a.final_score)
    .map((e, i) => ({ position: i + 1, ...e, category: categorize(e.final_score) }));
}

const R1 = makeEntries('cp-', [40, 50, 60, 70, 80]);
const R2 = makeEntries('hdd-', [50, 60, 70, 80, 90]);

function stat(result: ReturnType<typeof compareRankings>, metric: string) {
  return result.stats.find(s => s.metric === metric);
}


// ═══════════════════════════════════════════════════════════════════════════════
// COMPARISON
// ═══════════════════════════════════════════════════════════════════════════════

describe('compareRankings', () => {
  it('reports delta as right minus left', () => {
    const result = compareRankings({ label: 'CP', entries: R1 }, { label: 'HDD', entries: R2 });

    expect(result.labels).toEqual(['CP', 'HDD']);
    expect(stat(result, 'count')).toEqual({ metric: 'count', left: 5, right: 5, delta: 0 });
    expect(stat(result, 'mean')).toEqual({ metric: 'mean', left: 60, right: 70, delta: 10 });
    expect(stat(result, 'max')).toEqual({ metric: 'max', left: 80, right: 90, delta: 10 });
    expect(stat(result, 'min')).toEqual({ metric: 'min', left: 40, right: 50, delta: 10 });
    expect(stat(result, 'std')?.left).toBeCloseTo(Math.sqrt(250), 10);
    expect(stat(result, 'std')?.delta).toBeCloseTo(0, 10);
  });

  it('counts categories on both sides with a total', () => {
    const result = compareRankings({ label: 'CP', entries: R1 }, { label: 'HDD', entries: R2 });
    expect(result.categories).toEqual([
      { category: 'Excelente', left: 0, right: 1, total: 1 },
      { category: 'Muy Bueno', left: 1, right: 1, total: 2 },
      { category: 'Bueno', left: 2, right: 2, total: 4 },
      { category: 'Regular', left: 2, right: 1, total: 3 },
      { category: 'Necesita Mejora', left: 0, right: 0, total: 0 },
    ]);
  });

  it('leaves undefined statistics empty for an empty side', () => {
    const result = compareRankings({ label: 'CP', entries: [] }, { label: 'HDD', entries: R2 });
    expect(stat(result, 'count')).toEqual({ metric: 'count', left: 0, right: 5, delta: 5 });
    expect(stat(result, 'max')).toEqual({ metric: 'max', left: null, right: 90, delta: null });
  });
});

describe('scoreStats', () => {
  it('std of a single entry is 0', () => {
    expect(scoreStats(makeEntries('x', [42]))).toEqual({ count: 1, max: 42, min: 42, mean: 42, std: 0 });
  });
});


// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════════

describe('quantile', () => {
  it('interpolates between the closest ranks', () => {
    expect(quantile([40, 50, 60, 70, 80], 0.5)).toBe(60);
    expect(quantile([40, 50, 60, 70, 80], 0.1)).toBeCloseTo(44, 10);
    expect(quantile([1, 2], 1)).toBe(2);
    expect(quantile([], 0.5)).toBeNull();
  });
});

describe('summarizeRanking', () => {
  it('summarizes distribution, shares and extremes', () => {
    const summary = summarizeRanking(R1, 2);

    expect(summary.median).toBe(60);
    expect(summary.q1).toBe(50);
    expect(summary.q3).toBe(70);
    expect(summary.iqr).toBe(20);
    expect(summary.percentiles.find(p => p.percentile === 95)?.value).toBeCloseTo(78, 10);
    expect(summary.percentiles.find(p => p.percentile === 99)?.value).toBeCloseTo(79.6, 10);
    expect(summary.categories.find(c => c.category === 'Regular')).toEqual({ category: 'Regular', count: 2, share: 40 });
    expect(summary.top.map(e => e.final_score)).toEqual([80, 70]);
    expect(summary.bottom.map(e => e.final_score)).toEqual([50, 40]);
  });

  it('handles an empty ranking', () => {
    const summary = summarizeRanking([]);
    expect(summary.count).toBe(0);
    expect(summary.median).toBeNull();
    expect(summary.iqr).toBeNull();
    expect(summary.top).toEqual([]);
  });
});
