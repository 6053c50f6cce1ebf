// ═══════════════════════════════════════════════════════════════════════════════
// PERCENTILE ENGINE — Population normalization
// ═══════════════════════════════════════════════════════════════════════════════
//
// FORMULA (rank-based percentile):
//   percentile_rank = below / (below + above) × 100
//     below = count of population values strictly < x
//     above = count of population values strictly > x
//
//   lower_better  → normalized = 100 − percentile_rank
//   higher_better → normalized = percentile_rank
//
// Ties share the same rank, and values tied at either end get 0 or 100, so
// scoring x as higher_better equals scoring −x as lower_better. A population
// of one, or one where every value is equal, gets 100 (vacuous best).
// The formula is the same for every domain, area and metric kind; only the
// polarity differs.
//
//   raw [10, 20, 30, 40, 50], lower_better → [100, 75, 50, 25, 0]
//
// FOUR-TIER LABELING (used by explanations):
//   ≥80  → excellent
//   60–79 → good
//   40–59 → regular
//   <40  → critical
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Polarity } from '../types/ranking';

export type PerformanceTier = 'excellent' | 'good' | 'regular' | 'critical';

export interface PopulationMember {
  entity_id: string;
  value: number;
}

export interface NormalizedMember extends PopulationMember {
  percentile_rank: number;
  normalized_score: number;
}


// ═══════════════════════════════════════════════════════════════════════════════
// CORE PERCENTILE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Pure rank-based percentile.
 *
 *   result = below / (below + above) × 100
 *
 * Values equal to `current` (including itself) count on neither side.
 * Returns NaN when no value in `dataset` differs from `current`.
 */
export function rankPercentile(current: number, dataset: readonly number[]): number {
  let below = 0;
  let above = 0;
  for (const v of dataset) {
    if (v < current) below++;
    else if (v > current) above++;
  }
  if (below + above === 0) return NaN;
  return (below / (below + above)) * 100;
}

/** Apply polarity: the returned score is always "higher is better". */
export function applyPolarity(percentileRank: number, polarity: Polarity): number {
  return polarity === 'lower_better' ? 100 - percentileRank : percentileRank;
}

/**
 * Normalize a whole (area, metric kind) population at once.
 * Output order follows input order.
 */
export function normalizePopulation(
  members: readonly PopulationMember[],
  polarity: Polarity,
): NormalizedMember[] {
  const values = members.map(m => m.value);

  return members.map(member => {
    const rank = rankPercentile(member.value, values);
    if (Number.isNaN(rank)) {
      // Nobody to compare against: best under either polarity
      return {
        ...member,
        percentile_rank: polarity === 'lower_better' ? 0 : 100,
        normalized_score: 100,
      };
    }
    return {
      ...member,
      percentile_rank: rank,
      normalized_score: applyPolarity(rank, polarity),
    };
  });
}


// ═══════════════════════════════════════════════════════════════════════════════
// FOUR-TIER LABELING
// ═══════════════════════════════════════════════════════════════════════════════

export function getPerformanceTier(score: number): PerformanceTier {
  if (score >= 80) return 'excellent';
  if (score >= 60) return 'good';
  if (score >= 40) return 'regular';
  return 'critical';
}

/**
 * Format a 0–100 score for display
 */
export function formatScore(score: number): string {
  return `${score.toFixed(1)}pts`;
}
