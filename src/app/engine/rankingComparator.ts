// ═══════════════════════════════════════════════════════════════════════════════
// RANKING COMPARATOR & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two finished rankings are compared by distribution only; entities are never
// aligned across them (CP equipment and HDD units are different populations).
//
//   stats:      count, max, min, mean, std (sample, n − 1) of final_score
//               delta = right − left
//   categories: count per label in each ranking + their sum
//
// A single ranking can also be summarized: quartiles, percentiles (linear
// interpolation between closest ranks), category shares, top and bottom N.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  CategoryCountRow,
  CategoryLabel,
  ComparisonMetric,
  ComparisonResult,
  ComparisonStatRow,
  RankingEntry,
} from '../types/ranking';
import { CATEGORY_LABELS } from '../types/ranking';
import { countCategories } from './categorizer';
import { mean, sampleStd } from './subMetrics';

export interface LabeledRanking {
  label: string;
  entries: readonly RankingEntry[];
}

export interface ScoreStats {
  count: number;
  max: number | null;
  min: number | null;
  mean: number | null;
  /** Sample standard deviation; 0 for one entry, null for none */
  std: number | null;
}

export function scoreStats(entries: readonly RankingEntry[]): ScoreStats {
  const scores = entries.map(e => e.final_score);
  if (scores.length === 0) {
    return { count: 0, max: null, min: null, mean: null, std: null };
  }
  return {
    count: scores.length,
    max: Math.max(...scores),
    min: Math.min(...scores),
    mean: mean(scores),
    std: sampleStd(scores),
  };
}

const COMPARISON_METRICS: readonly ComparisonMetric[] = ['count', 'max', 'min', 'mean', 'std'];

/**
 * Compare two rankings by distribution.
 */
export function compareRankings(left: LabeledRanking, right: LabeledRanking): ComparisonResult {
  const leftStats = scoreStats(left.entries);
  const rightStats = scoreStats(right.entries);

  const stats: ComparisonStatRow[] = COMPARISON_METRICS.map(metric => {
    const l = leftStats[metric];
    const r = rightStats[metric];
    return {
      metric,
      left: l,
      right: r,
      delta: l === null || r === null ? null : r - l,
    };
  });

  const leftCounts = countCategories(left.entries);
  const rightCounts = countCategories(right.entries);
  const categories: CategoryCountRow[] = CATEGORY_LABELS.map(category => ({
    category,
    left: leftCounts[category],
    right: rightCounts[category],
    total: leftCounts[category] + rightCounts[category],
  }));

  return { labels: [left.label, right.label], stats, categories };
}


// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════════

export const SUMMARY_PERCENTILES = [10, 25, 50, 75, 90, 95, 99] as const;

export interface CategoryShare {
  category: CategoryLabel;
  count: number;
  /** Percentage of ranked entities, 0–100 */
  share: number;
}

export interface RankingSummary extends ScoreStats {
  median: number | null;
  q1: number | null;
  q3: number | null;
  iqr: number | null;
  percentiles: Array<{ percentile: number; value: number | null }>;
  categories: CategoryShare[];
  top: RankingEntry[];
  bottom: RankingEntry[];
}

/**
 * Quantile of an ascending array, `q` in [0, 1].
 * Linear interpolation between the two closest ranks.
 */
export function quantile(sorted: readonly number[], q: number): number | null {
  if (sorted.length === 0) return null;
  const h = (sorted.length - 1) * q;
  const lo = Math.floor(h);
  const hi = Math.min(lo + 1, sorted.length - 1);
  return sorted[lo] + (h - lo) * (sorted[hi] - sorted[lo]);
}

export function summarizeRanking(entries: readonly RankingEntry[], topN = 10): RankingSummary {
  const ordered = [...entries].sort((a, b) => a.position - b.position);
  const sorted = ordered.map(e => e.final_score).sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const counts = countCategories(ordered);

  return {
    ...scoreStats(ordered),
    median: quantile(sorted, 0.5),
    q1,
    q3,
    iqr: q1 === null || q3 === null ? null : q3 - q1,
    percentiles: SUMMARY_PERCENTILES.map(p => ({ percentile: p, value: quantile(sorted, p / 100) })),
    categories: CATEGORY_LABELS.map(category => ({
      category,
      count: counts[category],
      share: ordered.length === 0 ? 0 : (counts[category] / ordered.length) * 100,
    })),
    top: ordered.slice(0, topN),
    bottom: ordered.slice(Math.max(0, ordered.length - topN)),
  };
}
