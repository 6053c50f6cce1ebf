// ═══════════════════════════════════════════════════════════════════════════════
// WINDOW EXTRACTOR — Last W daily observations per (entity, area)
// ═══════════════════════════════════════════════════════════════════════════════
//
// Records are grouped by (entity_id, area_id), cleaned, sorted ascending by
// date and cut to the most recent W. Gaps are kept as gaps: nothing is
// interpolated. A pair with zero usable records produces no window, so the
// entity is simply absent from that area's population.
//
// Cleaning (each dropped record becomes a RunCondition):
//   - unparseable date or non-finite value   → invalid_record
//   - value outside config.value_bounds       → out_of_bounds
//   - repeated (entity, area, date)           → duplicate_record, last one wins
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { MetricRecord, MetricWindow, RunCondition } from '../types/ranking';
import type { EngineConfig } from './config';
import { compareIds } from './rankAssigner';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Day number (days since 1970-01-01 UTC) of a `YYYY-MM-DD…` date string.
 * Returns null for anything that is not a real calendar day.
 */
export function toDayNumber(date: string): number | null {
  const match = DATE_PREFIX.exec(date);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return Math.round(ms / MS_PER_DAY);
}

export interface WindowExtraction {
  /** Sorted by area_id, then entity_id */
  windows: MetricWindow[];
  conditions: RunCondition[];
}

export interface DatedRecord {
  day: number;
  record: MetricRecord;
}

/**
 * Keep the most recent `windowSize` records of one (entity, area), ascending.
 * Callers pass records that already have a valid day number.
 */
export function selectWindow(records: readonly DatedRecord[], windowSize: number): MetricRecord[] {
  return [...records]
    .sort((a, b) => a.day - b.day)
    .slice(-windowSize)
    .map(r => r.record);
}

function pairKey(entityId: string, areaId: string): string {
  return `${areaId}\u0000${entityId}`;
}

export function extractWindows(records: readonly MetricRecord[], config: EngineConfig): WindowExtraction {
  const conditions: RunCondition[] = [];
  const groups = new Map<string, { entity_id: string; area_id: string; byDay: Map<number, MetricRecord> }>();
  const bounds = config.value_bounds;

  for (const record of records) {
    const { entity_id, area_id } = record;
    const day = toDayNumber(record.date);

    if (day === null || !Number.isFinite(record.raw_value)) {
      conditions.push({
        kind: 'invalid_record',
        message: `Dropped record with ${day === null ? `invalid date '${record.date}'` : `non-numeric value ${record.raw_value}`}`,
        entity_id,
        area_id,
      });
      continue;
    }

    if (bounds && (record.raw_value < bounds.min || record.raw_value > bounds.max)) {
      conditions.push({
        kind: 'out_of_bounds',
        message: `Dropped value ${record.raw_value} on ${record.date}: outside [${bounds.min}, ${bounds.max}]`,
        entity_id,
        area_id,
      });
      continue;
    }

    const key = pairKey(entity_id, area_id);
    let group = groups.get(key);
    if (!group) {
      group = { entity_id, area_id, byDay: new Map() };
      groups.set(key, group);
    }

    if (group.byDay.has(day)) {
      conditions.push({
        kind: 'duplicate_record',
        message: `Repeated observation on ${record.date}; keeping the last one`,
        entity_id,
        area_id,
      });
    }
    group.byDay.set(day, record);
  }

  const windows: MetricWindow[] = [];
  for (const group of groups.values()) {
    const dated = Array.from(group.byDay.entries(), ([day, record]) => ({ day, record }));
    windows.push({
      entity_id: group.entity_id,
      area_id: group.area_id,
      records: selectWindow(dated, config.window_size),
    });
  }

  windows.sort((a, b) => compareIds(a.area_id, b.area_id) || compareIds(a.entity_id, b.entity_id));
  return { windows, conditions };
}
