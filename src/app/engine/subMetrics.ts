// ═══════════════════════════════════════════════════════════════════════════════
// SUB-METRIC CALCULATORS
// ═══════════════════════════════════════════════════════════════════════════════
//
//   fill           = mean(values)
//   instability    = sampleStd(values)                 × S_INST  (default 1000)
//   rate_of_change = sampleStd(day-over-day differences) × S_RATE (default 10000)
//
// Differences are only taken between observations exactly one day apart; a
// missing day breaks the chain. The standard deviation of a single sample is
// 0. Each statistic is produced only when the window is deep enough
// (config.min_samples), so shallow windows drop out of that sub-metric's
// population instead of being imputed.
//
// The scale factors are presentational (integer-friendly storage). Both the
// unscaled and the scaled statistic are returned; normalization uses the
// scaled one for the whole population, which leaves relative order unchanged.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { MetricKind, MetricRecord, MetricWindow } from '../types/ranking';
import { METRIC_KINDS } from '../types/ranking';
import type { EngineConfig } from './config';
import { toDayNumber } from './windowExtractor';

export interface RawSubMetric {
  entity_id: string;
  area_id: string;
  metric_kind: MetricKind;
  raw_value: number;
  scaled_value: number;
}


// ─── STATISTICS ─────────────────────────────────────────────────────────────

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n − 1). 0 for fewer than two values. */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

/**
 * `value[i] − value[i−1]` for entries on consecutive days.
 * Records must be ascending by date.
 */
export function consecutiveDifferences(records: readonly MetricRecord[]): number[] {
  const diffs: number[] = [];
  for (let i = 1; i < records.length; i++) {
    const prevDay = toDayNumber(records[i - 1].date);
    const day = toDayNumber(records[i].date);
    if (prevDay === null || day === null || day - prevDay !== 1) continue;
    diffs.push(records[i].raw_value - records[i - 1].raw_value);
  }
  return diffs;
}


// ─── CALCULATORS ────────────────────────────────────────────────────────────

function values(window: MetricWindow): number[] {
  return window.records.map(r => r.raw_value);
}

export function fill(window: MetricWindow): number {
  return mean(values(window));
}

export function instability(window: MetricWindow): number {
  return sampleStd(values(window));
}

/** null when the window holds no pair of consecutive days */
export function rateOfChange(window: MetricWindow): number | null {
  const diffs = consecutiveDifferences(window.records);
  if (diffs.length === 0) return null;
  return sampleStd(diffs);
}

/**
 * All sub-metrics the window is deep enough for.
 */
export function computeSubMetrics(window: MetricWindow, config: EngineConfig): RawSubMetric[] {
  const depth = window.records.length;
  const result: RawSubMetric[] = [];

  const push = (kind: MetricKind, raw: number) => {
    result.push({
      entity_id: window.entity_id,
      area_id: window.area_id,
      metric_kind: kind,
      raw_value: raw,
      scaled_value: raw * config.scale_factors[kind],
    });
  };

  if (depth === 0) return result;

  if (depth >= config.min_samples[METRIC_KINDS.FILL]) {
    push(METRIC_KINDS.FILL, fill(window));
  }
  if (depth >= config.min_samples[METRIC_KINDS.INSTABILITY]) {
    push(METRIC_KINDS.INSTABILITY, instability(window));
  }
  if (depth >= config.min_samples[METRIC_KINDS.RATE_OF_CHANGE]) {
    const rate = rateOfChange(window);
    if (rate !== null) push(METRIC_KINDS.RATE_OF_CHANGE, rate);
  }

  return result;
}
