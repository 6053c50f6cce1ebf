// ═══════════════════════════════════════════════════════════════════════════════
// EXPLANATIONS & RECOMMENDATIONS
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every normalized sub-metric is rendered as one sentence, keyed by its
// four-tier label (see percentileEngine). Sentences are grouped by area
// (ascending area_id) and joined with " | ".
//
// RECOMMENDATION RULES:
//   any critical sub-metric in an area → area is critical  → "Intervención inmediata"
//   otherwise any regular sub-metric   → area is regular   → "Optimizar rendimiento"
//   more than 3 critical areas         → "Revisión completa"
//   no critical and no regular areas   → "Mantener estándares actuales"
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { AreaScore, MetricKind, SubMetricValue } from '../types/ranking';
import { METRIC_KINDS, METRIC_KIND_LIST } from '../types/ranking';
import { formatScore, getPerformanceTier, type PerformanceTier } from '../utils/percentileEngine';
import type { EngineConfig } from './config';
import { direction } from './directionRegistry';
import { compareIds } from './rankAssigner';

const MAX_LISTED_AREAS = 3;
const FULL_REVIEW_THRESHOLD = 3;

const TIER_WORDS: Record<MetricKind, Record<PerformanceTier, string>> = {
  [METRIC_KINDS.FILL]:           { excellent: 'Excelente',  good: 'Buena',    regular: 'Regular',   critical: 'Crítica' },
  [METRIC_KINDS.INSTABILITY]:    { excellent: 'Excelente',  good: 'Buena',    regular: 'Regular',   critical: 'Crítica' },
  [METRIC_KINDS.RATE_OF_CHANGE]: { excellent: 'Predecible', good: 'Estable',  regular: 'Variable',  critical: 'Caótica' },
};

function headline(kind: MetricKind, label: string): string {
  switch (kind) {
    case METRIC_KINDS.FILL:           return label;
    case METRIC_KINDS.INSTABILITY:    return `Estabilidad en ${label}`;
    case METRIC_KINDS.RATE_OF_CHANGE: return `Cambios en ${label}`;
  }
}

const DETAILS: Record<MetricKind, Record<PerformanceTier, (value: string) => string>> = {
  [METRIC_KINDS.FILL]: {
    excellent: v => `nivel bajo de ${v}, rendimiento excepcional.`,
    good:      v => `nivel de ${v}, rendimiento aceptable.`,
    regular:   v => `nivel de ${v}, posibles problemas de rendimiento.`,
    critical:  v => `nivel alto de ${v}, problemas significativos de rendimiento.`,
  },
  [METRIC_KINDS.INSTABILITY]: {
    excellent: v => `variabilidad muy baja (${v}), funcionamiento muy estable.`,
    good:      v => `variabilidad de ${v}, fluctuaciones menores.`,
    regular:   v => `variabilidad de ${v}, inestabilidad que puede afectar el rendimiento.`,
    critical:  v => `variabilidad alta (${v}), problemas graves de estabilidad.`,
  },
  [METRIC_KINDS.RATE_OF_CHANGE]: {
    excellent: v => `cambios diarios muy predecibles (${v}).`,
    good:      v => `cambios diarios relativamente estables (${v}).`,
    regular:   v => `cambios diarios impredecibles (${v}).`,
    critical:  v => `cambios diarios muy impredecibles (${v}), requiere atención inmediata.`,
  },
};

// A high fill level is the good end when the area is higher_better
const FILL_HIGHER_BETTER: Record<PerformanceTier, (value: string) => string> = {
  excellent: v => `nivel alto de ${v}, rendimiento excepcional.`,
  good:      v => `nivel de ${v}, rendimiento aceptable.`,
  regular:   v => `nivel de ${v}, posibles problemas de rendimiento.`,
  critical:  v => `nivel bajo de ${v}, problemas significativos de rendimiento.`,
};

function detail(sm: SubMetricValue, config: EngineConfig): Record<PerformanceTier, (value: string) => string> {
  if (sm.metric_kind === METRIC_KINDS.FILL && direction(config, sm.area_id, sm.metric_kind) === 'higher_better') {
    return FILL_HIGHER_BETTER;
  }
  return DETAILS[sm.metric_kind];
}

/** Human-readable name of an area, falling back to the identifier */
export function areaLabel(config: EngineConfig, areaId: string): string {
  const label = config.area_labels[areaId];
  if (label) return label;
  return config.domain === 'hdd' ? `Unidad ${areaId}` : areaId;
}

function kindOrder(a: SubMetricValue, b: SubMetricValue): number {
  return METRIC_KIND_LIST.indexOf(a.metric_kind) - METRIC_KIND_LIST.indexOf(b.metric_kind);
}

/**
 * One sentence for one normalized sub-metric.
 *
 * fill shows the unscaled mean; instability and rate of change show the
 * scaled statistic as stored.
 */
export function explainSubMetric(sm: SubMetricValue, config: EngineConfig): string {
  const tier = getPerformanceTier(sm.population_percentile);
  const label = areaLabel(config, sm.area_id);
  const shown = sm.metric_kind === METRIC_KINDS.FILL ? sm.raw_value : sm.scaled_value;
  const word = TIER_WORDS[sm.metric_kind][tier];

  return `${headline(sm.metric_kind, label)} ${word} (${formatScore(sm.population_percentile)}): `
    + `${sm.area_id} ${detail(sm, config)[tier](shown.toFixed(1))}`;
}

function sortedAreas(areaScores: readonly AreaScore[]): AreaScore[] {
  return [...areaScores].sort((a, b) => compareIds(a.area_id, b.area_id));
}

export function buildExplanation(areaScores: readonly AreaScore[], config: EngineConfig): string {
  const sentences: string[] = [];
  for (const area of sortedAreas(areaScores)) {
    for (const sm of [...area.sub_metrics].sort(kindOrder)) {
      sentences.push(explainSubMetric(sm, config));
    }
  }
  return sentences.join(' | ');
}

/** Worst tier across an area's sub-metrics */
export function areaTier(area: AreaScore): PerformanceTier {
  const tiers = area.sub_metrics.map(sm => getPerformanceTier(sm.population_percentile));
  if (tiers.includes('critical')) return 'critical';
  if (tiers.includes('regular')) return 'regular';
  if (tiers.includes('good')) return 'good';
  return 'excellent';
}

function listAreas(labels: readonly string[]): string {
  if (labels.length === 1) return labels[0];
  return `múltiples áreas: ${labels.slice(0, MAX_LISTED_AREAS).join(', ')}`;
}

export function buildRecommendation(areaScores: readonly AreaScore[], config: EngineConfig): string {
  const critical: string[] = [];
  const regular: string[] = [];

  for (const area of sortedAreas(areaScores)) {
    const tier = areaTier(area);
    if (tier === 'critical') critical.push(areaLabel(config, area.area_id));
    else if (tier === 'regular') regular.push(areaLabel(config, area.area_id));
  }

  const parts: string[] = [];
  if (critical.length > 0) parts.push(`Intervención inmediata requerida en ${listAreas(critical)}`);
  if (regular.length > 0) parts.push(`Optimizar rendimiento en ${listAreas(regular)}`);

  if (critical.length === 0 && regular.length === 0) {
    parts.push('Mantener estándares actuales de rendimiento');
  } else if (critical.length > FULL_REVIEW_THRESHOLD) {
    parts.push(config.domain === 'hdd'
      ? 'Revisión completa del almacenamiento requerida'
      : 'Revisión completa del equipo requerida');
  }

  return parts.join('; ');
}
