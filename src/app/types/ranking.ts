// ═══════════════════════════════════════════════════════════════════════════════
// Telemetry Ranking — Record, Score & Ranking Type System
// ═══════════════════════════════════════════════════════════════════════════════
//
// This file defines the complete type system for the ranking pipeline:
//
//   Raw Record → Window → Sub-Metric → Area Score → Composite Score → Rank
//
// Every domain (CP equipment areas, HDD disk units) produces the same shapes.
// Sub-metrics are normalized per (area, metric kind), combined per area, then
// combined across areas into one 0–100 score per entity.
//
// ═══════════════════════════════════════════════════════════════════════════════


// ─── ENUMS ───────────────────────────────────────────────────────────────────

export type Domain = 'cp' | 'hdd';
export type Polarity = 'lower_better' | 'higher_better';

export const DOMAINS: readonly Domain[] = ['cp', 'hdd'];

/**
 * Canonical list of sub-metrics computed for every (entity, area) window.
 */
export const METRIC_KINDS = {
  FILL:           'fill',             // mean of the window
  INSTABILITY:    'instability',      // scaled sample std of the window
  RATE_OF_CHANGE: 'rate_of_change',   // scaled sample std of day-over-day differences
} as const;

export type MetricKind = typeof METRIC_KINDS[keyof typeof METRIC_KINDS];

export const METRIC_KIND_LIST: readonly MetricKind[] = [
  METRIC_KINDS.FILL,
  METRIC_KINDS.INSTABILITY,
  METRIC_KINDS.RATE_OF_CHANGE,
];

/** Fixed category vocabulary, best first. */
export const CATEGORY_LABELS = [
  'Excelente',
  'Muy Bueno',
  'Bueno',
  'Regular',
  'Necesita Mejora',
] as const;

export type CategoryLabel = typeof CATEGORY_LABELS[number];


// ═══════════════════════════════════════════════════════════════════════════════
// INPUT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One daily observation. Identity is (entity_id, area_id, date).
 * `date` is `YYYY-MM-DD` or a full ISO timestamp (only the day part is used).
 */
export interface MetricRecord {
  readonly entity_id: string;
  readonly area_id: string;
  readonly date: string;
  readonly raw_value: number;
}

/** Up to W records of one (entity, area), ascending by date. Never empty. */
export interface MetricWindow {
  readonly entity_id: string;
  readonly area_id: string;
  readonly records: readonly MetricRecord[];
}


// ═══════════════════════════════════════════════════════════════════════════════
// SCORES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A sub-metric after population normalization.
 * `raw_value` is the unscaled statistic, `scaled_value` the one stored and
 * normalized. `population_percentile` is direction-adjusted: higher is better.
 */
export interface SubMetricValue {
  entity_id: string;
  area_id: string;
  metric_kind: MetricKind;
  raw_value: number;
  scaled_value: number;
  percentile_rank: number;
  population_percentile: number;
  population_size: number;
}

export interface AreaScore {
  entity_id: string;
  area_id: string;
  score: number;
  sub_metrics: SubMetricValue[];
  /** Renormalized sub-metric weights actually applied (sum to 1) */
  weights_used: Partial<Record<MetricKind, number>>;
}

export interface CompositeScore {
  entity_id: string;
  final_score: number;
  category: CategoryLabel;
  contributing_areas: string[];
  area_scores: AreaScore[];
  explanation: string;
  recommendation: string;
}

export interface RankingEntry {
  position: number;
  entity_id: string;
  final_score: number;
  category: CategoryLabel;
}


// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT ROWS
// ═══════════════════════════════════════════════════════════════════════════════

export interface AreaRankingRow {
  area_id: string;
  entity_id: string;
  metric_kind: MetricKind;
  /** Position within the (area, metric_kind) population */
  position: number;
  normalized_value: number;
  raw_value: number;
  scaled_value: number;
  /** Newest first, padded with null up to the window size */
  raw_window_values: Array<number | null>;
  run_timestamp: string;
}

export interface CompositeRankingRow {
  position: number;
  entity_id: string;
  final_score: number;
  category: CategoryLabel;
  explanation: string;
  recommendation_text: string;
  contributing_areas: string[];
}

export type RunConditionKind =
  | 'invalid_record'
  | 'out_of_bounds'
  | 'duplicate_record'
  | 'empty_population'
  | 'missing_entity';

/** A non-fatal data condition observed during a run. */
export interface RunCondition {
  kind: RunConditionKind;
  message: string;
  entity_id?: string;
  area_id?: string;
  metric_kind?: MetricKind;
}

export interface RankingRun {
  domain: Domain;
  run_timestamp: string;
  window_size: number;
  entries: RankingEntry[];
  composites: CompositeScore[];
  area_rows: AreaRankingRow[];
  category_counts: Record<CategoryLabel, number>;
  excluded_entities: string[];
  conditions: RunCondition[];
}


// ═══════════════════════════════════════════════════════════════════════════════
// COMPARISON
// ═══════════════════════════════════════════════════════════════════════════════

export type ComparisonMetric = 'count' | 'max' | 'min' | 'mean' | 'std';

export interface ComparisonStatRow {
  metric: ComparisonMetric;
  left: number | null;
  right: number | null;
  /** right − left; null when either side is undefined */
  delta: number | null;
}

export interface CategoryCountRow {
  category: CategoryLabel;
  left: number;
  right: number;
  total: number;
}

export interface ComparisonResult {
  labels: [string, string];
  stats: ComparisonStatRow[];
  categories: CategoryCountRow[];
}


// ═══════════════════════════════════════════════════════════════════════════════
// UTILITY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Clamp to the 0..100 score range. */
export function clampScore(score: number): number {
  return Math.max(0, Math.min(100, score));
}

/** Round to two decimals for stored and displayed scores. */
export function roundScore(score: number): number {
  return Math.round(score * 100) / 100;
}

export function emptyCategoryCounts(): Record<CategoryLabel, number> {
  return {
    'Excelente': 0,
    'Muy Bueno': 0,
    'Bueno': 0,
    'Regular': 0,
    'Necesita Mejora': 0,
  };
}

export function isDomain(value: unknown): value is Domain {
  return value === 'cp' || value === 'hdd';
}

export function isCategoryLabel(value: unknown): value is CategoryLabel {
  return CATEGORY_LABELS.some(label => label === value);
}
