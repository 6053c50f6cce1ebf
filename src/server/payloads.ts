// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST PAYLOADS — Shape checks for JSON bodies
// ═══════════════════════════════════════════════════════════════════════════════
//
// Bodies arrive as `unknown` and are narrowed field by field. The first
// problem found is reported as a PayloadError (HTTP 400) naming the path,
// e.g. `records[3].raw_value must be a finite number`.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Context } from 'hono';
import type { MetricRecord, RankingEntry } from '../app/types/ranking';
import { isCategoryLabel } from '../app/types/ranking';
import type { LabeledRanking } from '../app/engine/rankingComparator';

export class PayloadError extends Error {
  path: string;

  constructor(path: string, message: string) {
    super(`${path} ${message}`);
    this.name = 'PayloadError';
    this.path = path;
  }
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value === '') throw new PayloadError(path, 'must be a non-empty string');
  return value;
}

function requireNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) throw new PayloadError(path, 'must be a finite number');
  return value;
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new PayloadError(path, 'must be an array');
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined ? undefined : requireString(value, path);
}

/** Parse the request body, turning malformed JSON into a PayloadError */
export async function readJsonBody(c: Context): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new PayloadError('body', 'must be valid JSON');
  }
  if (!isObject(body)) throw new PayloadError('body', 'must be a JSON object');
  return body;
}

/**
 * `{ entity_id, area_id | unit_id, date, raw_value }[]`
 * Values must be numbers; dates are validated later by the engine.
 */
export function parseRecords(value: unknown, path = 'records'): MetricRecord[] {
  return requireArray(value, path).map((item, i) => {
    const at = `${path}[${i}]`;
    if (!isObject(item)) throw new PayloadError(at, 'must be an object');
    return {
      entity_id: requireString(item.entity_id, `${at}.entity_id`),
      area_id: requireString(item.area_id ?? item.unit_id, `${at}.area_id`),
      date: requireString(item.date, `${at}.date`),
      raw_value: requireNumber(item.raw_value, `${at}.raw_value`),
    };
  });
}

export function parseEntries(value: unknown, path: string): RankingEntry[] {
  return requireArray(value, path).map((item, i) => {
    const at = `${path}[${i}]`;
    if (!isObject(item)) throw new PayloadError(at, 'must be an object');
    const category = item.category;
    if (!isCategoryLabel(category)) throw new PayloadError(`${at}.category`, 'must be a known category');
    return {
      position: requireNumber(item.position, `${at}.position`),
      entity_id: requireString(item.entity_id, `${at}.entity_id`),
      final_score: requireNumber(item.final_score, `${at}.final_score`),
      category,
    };
  });
}

export function parseLabeledRanking(value: unknown, path: string): LabeledRanking {
  if (!isObject(value)) throw new PayloadError(path, 'must be an object');
  return {
    label: requireString(value.label, `${path}.label`),
    entries: parseEntries(value.entries, `${path}.entries`),
  };
}

export function parseExpectedEntities(value: unknown): string[] | undefined {
  if (value === undefined) return undefined;
  return requireArray(value, 'expected_entities').map((item, i) => requireString(item, `expected_entities[${i}]`));
}

export function parseRunTimestamp(value: unknown): string | undefined {
  const ts = optionalString(value, 'run_timestamp');
  if (ts !== undefined && Number.isNaN(Date.parse(ts))) {
    throw new PayloadError('run_timestamp', 'must be an ISO timestamp');
  }
  return ts;
}
