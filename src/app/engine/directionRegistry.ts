// ═══════════════════════════════════════════════════════════════════════════════
// DIRECTION REGISTRY — Polarity per (domain, area, metric)
// ═══════════════════════════════════════════════════════════════════════════════
//
// LOOKUP ORDER:
//   1. metric_directions[area][metric_kind]
//   2. directions[area]
//   3. directions['*']  (explicit catch-all, e.g. HDD drive letters)
//
// An area matching none of these is a configuration error. Polarity is never
// inferred from the data.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { METRIC_KIND_LIST, type MetricKind, type Polarity } from '../types/ranking';
import { WILDCARD_AREA, type EngineConfig } from './config';
import { RankingConfigError } from './errors';

export function direction(config: EngineConfig, areaId: string, metricKind?: MetricKind): Polarity {
  if (metricKind) {
    const override = config.metric_directions[areaId]?.[metricKind];
    if (override) return override;
  }

  const polarity = config.directions[areaId] ?? config.directions[WILDCARD_AREA];
  if (!polarity) {
    throw new RankingConfigError(
      `No direction registered for ${config.domain.toUpperCase()} area '${areaId}'`,
      { domain: config.domain, area_id: areaId, metric_kind: metricKind },
    );
  }
  return polarity;
}

/** True when every metric kind of the area resolves to a polarity. */
function isCovered(config: EngineConfig, areaId: string): boolean {
  if (config.directions[areaId] || config.directions[WILDCARD_AREA]) return true;
  const overrides = config.metric_directions[areaId];
  return overrides !== undefined && METRIC_KIND_LIST.every(kind => overrides[kind] !== undefined);
}

/**
 * Check every area of a batch before scoring starts.
 * Reports all unregistered areas at once, sorted.
 */
export function assertDirectionsCover(config: EngineConfig, areaIds: Iterable<string>): void {
  const missing: string[] = [];
  for (const areaId of new Set(areaIds)) {
    if (!isCovered(config, areaId)) missing.push(areaId);
  }
  if (missing.length === 0) return;

  missing.sort();
  throw new RankingConfigError(
    `No direction registered for ${config.domain.toUpperCase()} area(s): ${missing.join(', ')}`,
    { domain: config.domain, area_id: missing[0] },
  );
}
