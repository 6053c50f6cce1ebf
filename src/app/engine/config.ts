// ═══════════════════════════════════════════════════════════════════════════════
// Telemetry Ranking — Engine & Runtime Configuration
// ═══════════════════════════════════════════════════════════════════════════════
//
// The engine receives ONE immutable EngineConfig per run. Nothing in the
// engine reads process state, so runs with different configurations can
// execute side by side.
//
// Runtime settings (database, HTTP port, batch sizes) are read from the
// environment by the entry points. Copy .env.example → .env and fill in:
//
//   SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY
//   PORT, RANKING_WINDOW_SIZE, RANKING_WRITE_BATCH_SIZE, RANKING_CACHE_TTL_MS
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { CategoryLabel, Domain, MetricKind, Polarity } from '../types/ranking';
import { METRIC_KINDS, METRIC_KIND_LIST, isCategoryLabel } from '../types/ranking';
import { RankingConfigError } from './errors';


// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/** Explicit catch-all direction entry. Never inferred, only configured. */
export const WILDCARD_AREA = '*';

export interface CategoryBand {
  label: CategoryLabel;
  /** Inclusive lower bound of the band */
  min: number;
}

export interface ValueBounds {
  min: number;
  max: number;
}

export interface EngineConfig {
  readonly domain: Domain;
  /** Number of most recent daily observations per (entity, area) */
  readonly window_size: number;
  /** area_id → polarity; may contain WILDCARD_AREA */
  readonly directions: Readonly<Record<string, Polarity>>;
  /** area_id → per-metric polarity overrides */
  readonly metric_directions: Readonly<Record<string, Readonly<Partial<Record<MetricKind, Polarity>>>>>;
  readonly sub_metric_weights: Readonly<Record<MetricKind, number>>;
  readonly area_weights: Readonly<Record<string, number>>;
  /** Weight of areas absent from `area_weights` */
  readonly default_area_weight: number;
  /** Presentational multipliers; normalization runs on the scaled value */
  readonly scale_factors: Readonly<Record<MetricKind, number>>;
  /** Minimum window depth for a sub-metric to be computed */
  readonly min_samples: Readonly<Record<MetricKind, number>>;
  /** Evaluated highest-first */
  readonly category_bands: readonly CategoryBand[];
  /** Records outside these bounds are dropped before windowing */
  readonly value_bounds: ValueBounds | null;
  /** Human-readable area names used in explanations */
  readonly area_labels: Readonly<Record<string, string>>;
}

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'domain'>>;

export const DEFAULT_WINDOW_SIZE = 7;

export const DEFAULT_SUB_METRIC_WEIGHTS: Record<MetricKind, number> = {
  [METRIC_KINDS.FILL]:           1 / 3,
  [METRIC_KINDS.INSTABILITY]:    1 / 3,
  [METRIC_KINDS.RATE_OF_CHANGE]: 1 / 3,
};

export const DEFAULT_SCALE_FACTORS: Record<MetricKind, number> = {
  [METRIC_KINDS.FILL]:           1,
  [METRIC_KINDS.INSTABILITY]:    1000,
  [METRIC_KINDS.RATE_OF_CHANGE]: 10000,
};

/**
 * A single observation gives an instability of 0; rate of change needs at
 * least two consecutive days.
 */
export const DEFAULT_MIN_SAMPLES: Record<MetricKind, number> = {
  [METRIC_KINDS.FILL]:           1,
  [METRIC_KINDS.INSTABILITY]:    1,
  [METRIC_KINDS.RATE_OF_CHANGE]: 2,
};

export const DEFAULT_CATEGORY_BANDS: CategoryBand[] = [
  { label: 'Excelente',       min: 90 },
  { label: 'Muy Bueno',       min: 75 },
  { label: 'Bueno',           min: 60 },
  { label: 'Regular',         min: 40 },
  { label: 'Necesita Mejora', min: 0 },
];

/** CP telemetry areas and what they measure */
export const CP_AREA_LABELS: Record<string, string> = {
  PP_NFD: 'Archivos no encontrados',
  IOLOAD: 'Carga de entrada/salida',
  totmem: 'Memoria total utilizada',
  CUMOVR: 'Sobrecarga acumulativa',
  OMOVRN: 'Overhead de memoria',
  TLCONS: 'Tiempo de respuesta de consola',
  OMLDAV: 'Carga promedio de memoria',
  CPLOAD: 'Carga del procesador',
  MAXMEM: 'Memoria máxima utilizada',
};


// ─── Builders ────────────────────────────────────────────────────────────────

function freezeConfig(config: EngineConfig): EngineConfig {
  return Object.freeze({
    ...config,
    directions: Object.freeze({ ...config.directions }),
    metric_directions: Object.freeze(
      Object.fromEntries(
        Object.entries(config.metric_directions).map(([area, overrides]) => [area, Object.freeze({ ...overrides })]),
      ),
    ),
    sub_metric_weights: Object.freeze({ ...config.sub_metric_weights }),
    area_weights: Object.freeze({ ...config.area_weights }),
    scale_factors: Object.freeze({ ...config.scale_factors }),
    min_samples: Object.freeze({ ...config.min_samples }),
    category_bands: Object.freeze(config.category_bands.map(band => Object.freeze({ ...band }))),
    value_bounds: config.value_bounds ? Object.freeze({ ...config.value_bounds }) : null,
    area_labels: Object.freeze({ ...config.area_labels }),
  });
}

/**
 * Build a validated, frozen engine configuration.
 * Throws RankingConfigError if any part is unusable.
 */
export function createEngineConfig(domain: Domain, overrides: EngineConfigOverrides = {}): EngineConfig {
  const config: EngineConfig = {
    domain,
    window_size: overrides.window_size ?? DEFAULT_WINDOW_SIZE,
    directions: overrides.directions ?? {},
    metric_directions: overrides.metric_directions ?? {},
    sub_metric_weights: overrides.sub_metric_weights ?? DEFAULT_SUB_METRIC_WEIGHTS,
    area_weights: overrides.area_weights ?? {},
    default_area_weight: overrides.default_area_weight ?? 1,
    scale_factors: overrides.scale_factors ?? DEFAULT_SCALE_FACTORS,
    min_samples: overrides.min_samples ?? DEFAULT_MIN_SAMPLES,
    category_bands: overrides.category_bands ?? DEFAULT_CATEGORY_BANDS,
    value_bounds: overrides.value_bounds ?? null,
    area_labels: overrides.area_labels ?? {},
  };

  validateEngineConfig(config);
  return freezeConfig(config);
}

/** Derive a new configuration from an existing one. */
export function withOverrides(base: EngineConfig, overrides: EngineConfigOverrides): EngineConfig {
  const { domain, ...current } = base;
  return createEngineConfig(domain, { ...current, ...overrides });
}

/** CP equipment: every area is a load or memory figure, lower is better */
export const CP_ENGINE_CONFIG: EngineConfig = createEngineConfig('cp', {
  directions: Object.fromEntries(Object.keys(CP_AREA_LABELS).map(area => [area, 'lower_better' as const])),
  sub_metric_weights: {
    [METRIC_KINDS.FILL]:           0.4,
    [METRIC_KINDS.INSTABILITY]:    0.3,
    [METRIC_KINDS.RATE_OF_CHANGE]: 0.3,
  },
  area_labels: CP_AREA_LABELS,
});

/** HDD units: disk usage percentage per drive, lower is better */
export const HDD_ENGINE_CONFIG: EngineConfig = createEngineConfig('hdd', {
  directions: { [WILDCARD_AREA]: 'lower_better' },
  sub_metric_weights: {
    [METRIC_KINDS.FILL]:           0.4,
    [METRIC_KINDS.INSTABILITY]:    0.4,
    [METRIC_KINDS.RATE_OF_CHANGE]: 0.2,
  },
  value_bounds: { min: 0, max: 100 },
});

export const DEFAULT_ENGINE_CONFIGS: Record<Domain, EngineConfig> = {
  cp: CP_ENGINE_CONFIG,
  hdd: HDD_ENGINE_CONFIG,
};


// ─── Validation ──────────────────────────────────────────────────────────────

function assertWeight(value: number, what: string, domain: Domain, allowZero: boolean): void {
  if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
    throw new RankingConfigError(
      `${what} must be a finite ${allowZero ? 'non-negative' : 'positive'} number, got ${value}`,
      { domain },
    );
  }
}

function isPolarity(value: unknown): value is Polarity {
  return value === 'lower_better' || value === 'higher_better';
}

/**
 * Fail fast on configuration errors. Called before any scoring begins.
 */
export function validateEngineConfig(config: EngineConfig): void {
  const { domain } = config;

  if (!Number.isInteger(config.window_size) || config.window_size < 1) {
    throw new RankingConfigError(`window_size must be a positive integer, got ${config.window_size}`, { domain });
  }

  for (const [area, polarity] of Object.entries(config.directions)) {
    if (!isPolarity(polarity)) {
      throw new RankingConfigError(`Unknown polarity '${String(polarity)}' for area ${area}`, { domain, area_id: area });
    }
  }
  for (const [area, overrides] of Object.entries(config.metric_directions)) {
    for (const kind of METRIC_KIND_LIST) {
      const polarity = overrides[kind];
      if (polarity !== undefined && !isPolarity(polarity)) {
        throw new RankingConfigError(
          `Unknown polarity '${String(polarity)}' for ${kind} in area ${area}`,
          { domain, area_id: area, metric_kind: kind },
        );
      }
    }
  }

  let subTotal = 0;
  for (const kind of METRIC_KIND_LIST) {
    const weight = config.sub_metric_weights[kind];
    assertWeight(weight, `Sub-metric weight for ${kind}`, domain, true);
    subTotal += weight;

    const scale = config.scale_factors[kind];
    if (!Number.isFinite(scale) || scale <= 0) {
      throw new RankingConfigError(`Scale factor for ${kind} must be positive, got ${scale}`, { domain, metric_kind: kind });
    }

    const minSamples = config.min_samples[kind];
    if (!Number.isInteger(minSamples) || minSamples < 1) {
      throw new RankingConfigError(`min_samples for ${kind} must be a positive integer, got ${minSamples}`, { domain, metric_kind: kind });
    }
  }
  if (subTotal <= 0) {
    throw new RankingConfigError('Sub-metric weights must sum to a positive total', { domain });
  }
  if (config.min_samples[METRIC_KINDS.RATE_OF_CHANGE] < 2) {
    throw new RankingConfigError('rate_of_change needs min_samples of at least 2', { domain, metric_kind: METRIC_KINDS.RATE_OF_CHANGE });
  }

  assertWeight(config.default_area_weight, 'default_area_weight', domain, false);
  for (const [area, weight] of Object.entries(config.area_weights)) {
    assertWeight(weight, `Area weight for ${area}`, domain, false);
  }

  validateCategoryBands(config.category_bands, domain);

  if (config.value_bounds) {
    const { min, max } = config.value_bounds;
    if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
      throw new RankingConfigError(`value_bounds must satisfy min <= max, got [${min}, ${max}]`, { domain });
    }
  }
}

/**
 * Bands must be non-empty, strictly descending, inside [0, 100], end at 0
 * and use each label of the fixed vocabulary at most once.
 */
export function validateCategoryBands(bands: readonly CategoryBand[], domain?: Domain): void {
  if (bands.length === 0) {
    throw new RankingConfigError('category_bands must not be empty', { domain });
  }

  const seen = new Set<string>();
  let previous = Infinity;
  for (const band of bands) {
    if (!isCategoryLabel(band.label)) {
      throw new RankingConfigError(`Unknown category label '${band.label}'`, { domain });
    }
    if (seen.has(band.label)) {
      throw new RankingConfigError(`Category '${band.label}' appears more than once`, { domain });
    }
    seen.add(band.label);

    if (!Number.isFinite(band.min) || band.min < 0 || band.min > 100) {
      throw new RankingConfigError(`Band '${band.label}' threshold ${band.min} is outside [0, 100]`, { domain });
    }
    if (band.min >= previous) {
      throw new RankingConfigError(
        `Band '${band.label}' (>= ${band.min}) overlaps the band above it (>= ${previous})`,
        { domain },
      );
    }
    previous = band.min;
  }

  if (previous !== 0) {
    throw new RankingConfigError(`The lowest band must start at 0, got ${previous}`, { domain });
  }
}


// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface TableNames {
  cpHistory: string;
  hddHistory: string;
  areaResults: string;
  compositeResults: string;
  comparisons: string;
  unifiedResults: string;
}

export interface RuntimeConfig {
  supabase: { url: string; serviceKey: string };
  port: number;
  windowSize: number;
  /** Rows per insert request */
  writeBatchSize: number;
  /** How long the API keeps the latest run per domain */
  cacheTtlMs: number;
  tables: TableNames;
}

export const DEFAULT_TABLES: TableNames = {
  cpHistory: 'cp_history',
  hddHistory: 'hdd_history',
  areaResults: 'ranking_area_results',
  compositeResults: 'ranking_composite_results',
  comparisons: 'ranking_comparisons',
  unifiedResults: 'ranking_unified_results',
};

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${key} must be a positive integer, got '${raw}'`);
  }
  return value;
}

/**
 * Read runtime settings from the environment.
 * Entry points call this after loading .env.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    supabase: {
      url: env.SUPABASE_URL ?? '',
      serviceKey: env.SUPABASE_SERVICE_ROLE_KEY ?? '',
    },
    port: readPositiveInt(env, 'PORT', 8787),
    windowSize: readPositiveInt(env, 'RANKING_WINDOW_SIZE', DEFAULT_WINDOW_SIZE),
    writeBatchSize: readPositiveInt(env, 'RANKING_WRITE_BATCH_SIZE', 1000),
    cacheTtlMs: readPositiveInt(env, 'RANKING_CACHE_TTL_MS', 60 * 60 * 1000),
    tables: {
      cpHistory: env.RANKING_TABLE_CP_HISTORY ?? DEFAULT_TABLES.cpHistory,
      hddHistory: env.RANKING_TABLE_HDD_HISTORY ?? DEFAULT_TABLES.hddHistory,
      areaResults: env.RANKING_TABLE_AREA_RESULTS ?? DEFAULT_TABLES.areaResults,
      compositeResults: env.RANKING_TABLE_COMPOSITE_RESULTS ?? DEFAULT_TABLES.compositeResults,
      comparisons: env.RANKING_TABLE_COMPARISONS ?? DEFAULT_TABLES.comparisons,
      unifiedResults: env.RANKING_TABLE_UNIFIED_RESULTS ?? DEFAULT_TABLES.unifiedResults,
    },
  };
}

/** Supabase is usable only when both URL and key are present */
export function isSupabaseConfigured(config: RuntimeConfig): boolean {
  return config.supabase.url !== '' && config.supabase.serviceKey !== '';
}
