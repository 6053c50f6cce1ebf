// ═══════════════════════════════════════════════════════════════════════════════
// RANKING ENGINE — Batch pipeline for one domain
// ═══════════════════════════════════════════════════════════════════════════════
//
// PIPELINE:
//   validate config → check directions → extract windows → sub-metrics
//   → normalize per (area, metric kind) → area scores → final score
//   → categorize → explain → rank
//
// DESIGN PRINCIPLES:
//   1. Pure: no I/O, no logging, no clock unless run_timestamp is omitted.
//   2. Deterministic: same records + config + run_timestamp → identical run.
//   3. Fail fast on configuration; data problems become RunConditions.
//   4. A slice is either complete or absent, never partial.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  AreaRankingRow,
  CompositeRankingRow,
  CompositeScore,
  MetricKind,
  MetricRecord,
  MetricWindow,
  RankingEntry,
  RankingRun,
  RunCondition,
  SubMetricValue,
} from '../types/ranking';
import { METRIC_KIND_LIST, emptyCategoryCounts } from '../types/ranking';
import { normalizePopulation } from '../utils/percentileEngine';
import { validateEngineConfig, type EngineConfig } from './config';
import { assertDirectionsCover, direction } from './directionRegistry';
import { extractWindows } from './windowExtractor';
import { computeSubMetrics, type RawSubMetric } from './subMetrics';
import { computeEntityScores } from './compositeScorer';
import { categorize, countCategories } from './categorizer';
import { buildExplanation, buildRecommendation } from './explanations';
import { assignRanks, compareIds } from './rankAssigner';

export interface RunOptions {
  /** Fixed timestamp for reproducible output; defaults to now */
  run_timestamp?: string;
  /** Entities the caller expects; any without a score are reported as excluded */
  expected_entities?: readonly string[];
}

interface Population {
  area_id: string;
  metric_kind: MetricKind;
  members: SubMetricValue[];
}


// ─── HELPERS ─────────────────────────────────────────────────────────────────

function windowKey(entityId: string, areaId: string): string {
  return `${areaId}\u0000${entityId}`;
}

/** Newest first, null-padded to the window size */
export function windowValues(window: MetricWindow | undefined, windowSize: number): Array<number | null> {
  const values: Array<number | null> = window
    ? window.records.map(r => r.raw_value).reverse()
    : [];
  while (values.length < windowSize) values.push(null);
  return values.slice(0, windowSize);
}

function emptyRun(config: EngineConfig, runTimestamp: string): RankingRun {
  return {
    domain: config.domain,
    run_timestamp: runTimestamp,
    window_size: config.window_size,
    entries: [],
    composites: [],
    area_rows: [],
    category_counts: emptyCategoryCounts(),
    excluded_entities: [],
    conditions: [],
  };
}

/**
 * Group raw sub-metrics into (area, kind) populations and normalize each one.
 * Areas come out ascending, kinds in canonical order.
 */
function normalizePopulations(
  raw: readonly RawSubMetric[],
  areaIds: readonly string[],
  config: EngineConfig,
  conditions: RunCondition[],
): Population[] {
  const grouped = new Map<string, Map<MetricKind, RawSubMetric[]>>();
  for (const sm of raw) {
    let kinds = grouped.get(sm.area_id);
    if (!kinds) {
      kinds = new Map();
      grouped.set(sm.area_id, kinds);
    }
    const list = kinds.get(sm.metric_kind);
    if (list) list.push(sm);
    else kinds.set(sm.metric_kind, [sm]);
  }

  const populations: Population[] = [];
  for (const areaId of areaIds) {
    for (const kind of METRIC_KIND_LIST) {
      const slice = grouped.get(areaId)?.get(kind) ?? [];
      if (slice.length === 0) {
        conditions.push({
          kind: 'empty_population',
          message: `No entity has enough data for ${kind} in area ${areaId}`,
          area_id: areaId,
          metric_kind: kind,
        });
        continue;
      }

      const polarity = direction(config, areaId, kind);
      const normalized = normalizePopulation(
        slice.map(sm => ({ entity_id: sm.entity_id, value: sm.scaled_value })),
        polarity,
      );

      populations.push({
        area_id: areaId,
        metric_kind: kind,
        members: slice.map((sm, i) => ({
          entity_id: sm.entity_id,
          area_id: sm.area_id,
          metric_kind: sm.metric_kind,
          raw_value: sm.raw_value,
          scaled_value: sm.scaled_value,
          percentile_rank: normalized[i].percentile_rank,
          population_percentile: normalized[i].normalized_score,
          population_size: slice.length,
        })),
      });
    }
  }
  return populations;
}

function buildAreaRows(
  populations: readonly Population[],
  windows: ReadonlyMap<string, MetricWindow>,
  config: EngineConfig,
  runTimestamp: string,
): AreaRankingRow[] {
  const rows: AreaRankingRow[] = [];
  for (const population of populations) {
    const ranked = assignRanks(population.members.map(sm => ({ ...sm, score: sm.population_percentile })));
    for (const sm of ranked) {
      rows.push({
        area_id: sm.area_id,
        entity_id: sm.entity_id,
        metric_kind: sm.metric_kind,
        position: sm.position,
        normalized_value: sm.population_percentile,
        raw_value: sm.raw_value,
        scaled_value: sm.scaled_value,
        raw_window_values: windowValues(windows.get(windowKey(sm.entity_id, sm.area_id)), config.window_size),
        run_timestamp: runTimestamp,
      });
    }
  }
  return rows;
}


// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Rank every entity of one domain.
 *
 * Throws RankingConfigError before any scoring if the configuration is
 * unusable or an input area has no registered direction.
 */
export function runRanking(
  records: readonly MetricRecord[],
  config: EngineConfig,
  options: RunOptions = {},
): RankingRun {
  validateEngineConfig(config);
  const runTimestamp = options.run_timestamp ?? new Date().toISOString();
  const run = emptyRun(config, runTimestamp);

  assertDirectionsCover(config, records.map(r => r.area_id));

  const { windows, conditions } = extractWindows(records, config);
  run.conditions.push(...conditions);

  const windowIndex = new Map<string, MetricWindow>();
  for (const w of windows) windowIndex.set(windowKey(w.entity_id, w.area_id), w);

  const areaIds = Array.from(new Set(windows.map(w => w.area_id))).sort(compareIds);
  const rawSubMetrics = windows.flatMap(w => computeSubMetrics(w, config));
  const populations = normalizePopulations(rawSubMetrics, areaIds, config, run.conditions);

  const entityScores = computeEntityScores(populations.flatMap(p => p.members), config);
  const composites: CompositeScore[] = entityScores.map(es => ({
    entity_id: es.entity_id,
    final_score: es.final_score,
    category: categorize(es.final_score, config.category_bands),
    contributing_areas: es.contributing_areas,
    area_scores: es.area_scores,
    explanation: buildExplanation(es.area_scores, config),
    recommendation: buildRecommendation(es.area_scores, config),
  }));

  const ranked = assignRanks(composites.map(c => ({ entity_id: c.entity_id, score: c.final_score, composite: c })));
  run.composites = ranked.map(r => r.composite);
  run.entries = ranked.map((r): RankingEntry => ({
    position: r.position,
    entity_id: r.entity_id,
    final_score: r.composite.final_score,
    category: r.composite.category,
  }));
  run.category_counts = countCategories(run.composites);
  run.area_rows = buildAreaRows(populations, windowIndex, config, runTimestamp);

  // Entities seen in the input or expected by the caller but never scored
  const scored = new Set(run.entries.map(e => e.entity_id));
  const candidates = new Set<string>([
    ...records.map(r => r.entity_id),
    ...(options.expected_entities ?? []),
  ]);
  run.excluded_entities = Array.from(candidates).filter(id => !scored.has(id)).sort(compareIds);
  for (const entityId of run.excluded_entities) {
    run.conditions.push({
      kind: 'missing_entity',
      message: `Entity ${entityId} has no usable data in any area and was not ranked`,
      entity_id: entityId,
    });
  }

  return run;
}

/** Flatten a run into the persisted composite table shape */
export function toCompositeRows(run: RankingRun): CompositeRankingRow[] {
  return run.entries.map((entry, i) => {
    const composite = run.composites[i];
    return {
      position: entry.position,
      entity_id: entry.entity_id,
      final_score: entry.final_score,
      category: entry.category,
      explanation: composite.explanation,
      recommendation_text: composite.recommendation,
      contributing_areas: [...composite.contributing_areas],
    };
  });
}
