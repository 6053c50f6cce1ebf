// ═══════════════════════════════════════════════════════════════════════════════
// ROW MAPPERS — Engine values ↔ database rows
// ═══════════════════════════════════════════════════════════════════════════════
//
// Source rows with a missing field map to null and are counted by the caller.
// Result rows keep scores unrounded except where the column is NUMERIC(5,2).
// List-valued columns go through the list codec.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  AreaResultRow,
  ComparisonResultDbRow,
  CompositeResultRow,
  CpHistoryRow,
  HddHistoryRow,
  UnifiedResultRow,
} from '../types/database';
import type { ComparisonResult, MetricRecord, RankingRun } from '../types/ranking';
import { roundScore } from '../types/ranking';
import { encodeAreaList } from '../utils/listCodec';
import { toCompositeRows } from './rankingEngine';
import type { UnifiedRanking } from './unifiedScoring';


// ─── SOURCE ROWS ─────────────────────────────────────────────────────────────

export function fromCpRow(row: CpHistoryRow): MetricRecord | null {
  if (row.equipo === null || row.area === null || row.fecha === null || row.valor === null) return null;
  return { entity_id: row.equipo, area_id: row.area, date: row.fecha, raw_value: Number(row.valor) };
}

export function fromHddRow(row: HddHistoryRow): MetricRecord | null {
  if (row.equipo === null || row.unidad === null || row.fecha === null || row.uso === null) return null;
  return { entity_id: row.equipo, area_id: row.unidad, date: row.fecha, raw_value: Number(row.uso) };
}


// ─── RESULT ROWS ─────────────────────────────────────────────────────────────

export function toAreaResultRows(run: RankingRun): AreaResultRow[] {
  return run.area_rows.map(row => ({
    run_timestamp: row.run_timestamp,
    domain: run.domain,
    area_id: row.area_id,
    entity_id: row.entity_id,
    metric_kind: row.metric_kind,
    position: row.position,
    normalized_value: row.normalized_value,
    raw_value: row.raw_value,
    scaled_value: row.scaled_value,
    window_values: row.raw_window_values,
  }));
}

export function toCompositeResultRows(run: RankingRun): CompositeResultRow[] {
  return toCompositeRows(run).map(row => ({
    run_timestamp: run.run_timestamp,
    domain: run.domain,
    position: row.position,
    entity_id: row.entity_id,
    final_score: roundScore(row.final_score),
    category: row.category,
    explanation: row.explanation,
    recommendation_text: row.recommendation_text,
    contributing_areas: encodeAreaList(row.contributing_areas),
  }));
}

export function toComparisonRows(result: ComparisonResult, runTimestamp: string): ComparisonResultDbRow[] {
  const [left_label, right_label] = result.labels;
  const stats = result.stats.map((row): ComparisonResultDbRow => ({
    run_timestamp: runTimestamp,
    row_kind: 'stat',
    row_key: row.metric,
    left_label,
    right_label,
    left_value: row.left,
    right_value: row.right,
    combined_value: row.delta,
  }));
  const categories = result.categories.map((row): ComparisonResultDbRow => ({
    run_timestamp: runTimestamp,
    row_kind: 'category',
    row_key: row.category,
    left_label,
    right_label,
    left_value: row.left,
    right_value: row.right,
    combined_value: row.total,
  }));
  return [...stats, ...categories];
}

export function toUnifiedRows(ranking: UnifiedRanking, runTimestamp: string): UnifiedResultRow[] {
  return ranking.entries.map(entry => ({
    run_timestamp: runTimestamp,
    position: entry.position,
    entity_id: entry.entity_id,
    unified_score: roundScore(entry.unified_score),
    category: entry.category,
    cp_score: entry.cp_score === null ? null : roundScore(entry.cp_score),
    hdd_score: entry.hdd_score === null ? null : roundScore(entry.hdd_score),
    domains: encodeAreaList(entry.domains),
  }));
}
