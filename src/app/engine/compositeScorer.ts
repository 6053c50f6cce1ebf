// ═══════════════════════════════════════════════════════════════════════════════
// COMPOSITE SCORER — Sub-metrics → area score → final score
// ═══════════════════════════════════════════════════════════════════════════════
//
// FORMULA:
//   area_score  = Σ(w_k × percentile_k) / Σ(w_k)   over the sub-metrics k the
//                                                  (entity, area) actually has
//   final_score = Σ(w_a × area_score_a) / Σ(w_a)   over contributing areas a
//
// Both levels renormalize over what is present, so a missing sub-metric or a
// missing area never counts as a poor one. A sub-metric with weight 0 is
// carried for reporting but has no effect; an area whose available
// sub-metrics all weigh 0 does not contribute. An entity with no contributing
// area gets no CompositeScore at all.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { AreaScore, MetricKind, SubMetricValue } from '../types/ranking';
import { clampScore } from '../types/ranking';
import type { EngineConfig } from './config';
import { compareIds } from './rankAssigner';

/** A composite before it is categorized, explained and ranked */
export interface EntityScore {
  entity_id: string;
  final_score: number;
  /** Sorted ascending */
  contributing_areas: string[];
  /** Sorted by area_id */
  area_scores: AreaScore[];
}

export function areaWeight(config: EngineConfig, areaId: string): number {
  return config.area_weights[areaId] ?? config.default_area_weight;
}

/**
 * Combine the normalized sub-metrics of ONE (entity, area).
 * Returns null when no sub-metric with a positive weight is available.
 */
export function computeAreaScore(
  subMetrics: readonly SubMetricValue[],
  config: EngineConfig,
): AreaScore | null {
  if (subMetrics.length === 0) return null;

  let totalWeight = 0;
  let weighted = 0;
  for (const sm of subMetrics) {
    const weight = config.sub_metric_weights[sm.metric_kind];
    totalWeight += weight;
    weighted += weight * sm.population_percentile;
  }
  if (totalWeight <= 0) return null;

  const weights_used: Partial<Record<MetricKind, number>> = {};
  for (const sm of subMetrics) {
    weights_used[sm.metric_kind] = config.sub_metric_weights[sm.metric_kind] / totalWeight;
  }

  return {
    entity_id: subMetrics[0].entity_id,
    area_id: subMetrics[0].area_id,
    score: clampScore(weighted / totalWeight),
    sub_metrics: [...subMetrics],
    weights_used,
  };
}

/** Weighted mean of area scores. null when there is nothing to combine. */
export function combineAreaScores(areaScores: readonly AreaScore[], config: EngineConfig): number | null {
  let totalWeight = 0;
  let weighted = 0;
  for (const area of areaScores) {
    const weight = areaWeight(config, area.area_id);
    totalWeight += weight;
    weighted += weight * area.score;
  }
  if (totalWeight <= 0) return null;
  return clampScore(weighted / totalWeight);
}

/**
 * Build one EntityScore per entity that has at least one contributing area.
 * Output is sorted by entity_id.
 */
export function computeEntityScores(subMetrics: readonly SubMetricValue[], config: EngineConfig): EntityScore[] {
  // entity → area → sub-metrics
  const byEntity = new Map<string, Map<string, SubMetricValue[]>>();
  for (const sm of subMetrics) {
    let areas = byEntity.get(sm.entity_id);
    if (!areas) {
      areas = new Map();
      byEntity.set(sm.entity_id, areas);
    }
    const list = areas.get(sm.area_id);
    if (list) list.push(sm);
    else areas.set(sm.area_id, [sm]);
  }

  const result: EntityScore[] = [];
  for (const entityId of Array.from(byEntity.keys()).sort(compareIds)) {
    const areas = byEntity.get(entityId);
    if (!areas) continue;

    const area_scores: AreaScore[] = [];
    for (const areaId of Array.from(areas.keys()).sort(compareIds)) {
      const score = computeAreaScore(areas.get(areaId) ?? [], config);
      if (score) area_scores.push(score);
    }

    const final_score = combineAreaScores(area_scores, config);
    if (final_score === null) continue;

    result.push({
      entity_id: entityId,
      final_score,
      contributing_areas: area_scores.map(a => a.area_id),
      area_scores,
    });
  }

  return result;
}
