// ═══════════════════════════════════════════════════════════════════════════════
// Telemetry Ranking — PostgreSQL Data Model
// ═══════════════════════════════════════════════════════════════════════════════
//
// TypeScript types mirror the Postgres tables 1:1.
// SQL DDL is embedded as comments above each type.
//
// SOURCE TABLES are filled by the telemetry collectors; the ranking job only
// reads them. RESULT TABLES are append-only, one batch of rows per run,
// identified by run_timestamp.
//
// INDEXING STRATEGY:
//   history tables: (fecha DESC), (equipo, fecha DESC)
//   result tables:  (domain, run_timestamp DESC)
//
// ═══════════════════════════════════════════════════════════════════════════════


// ─── ENUMS ───────────────────────────────────────────────────────────────────

/*
CREATE TYPE ranking_domain AS ENUM ('cp', 'hdd');

CREATE TYPE metric_kind AS ENUM ('fill', 'instability', 'rate_of_change');

CREATE TYPE comparison_row_kind AS ENUM ('stat', 'category');
*/

export type ComparisonRowKind = 'stat' | 'category';


// ═══════════════════════════════════════════════════════════════════════════════
// 1. SOURCE TABLES
// ═══════════════════════════════════════════════════════════════════════════════

/*
CREATE TABLE cp_history (
  id      BIGSERIAL PRIMARY KEY,
  equipo  VARCHAR(64) NOT NULL,     -- equipment identifier
  area    VARCHAR(16) NOT NULL,     -- 'CPLOAD', 'IOLOAD', 'totmem', ...
  fecha   DATE NOT NULL,
  valor   DOUBLE PRECISION NOT NULL
);
CREATE INDEX idx_cp_history_fecha ON cp_history (fecha DESC);
*/

/** Columns are nullable on read: collectors have written partial rows before */
export interface CpHistoryRow {
  equipo: string | null;
  area: string | null;
  fecha: string | null;
  valor: number | null;
}

/*
CREATE TABLE hdd_history (
  id      BIGSERIAL PRIMARY KEY,
  equipo  VARCHAR(64) NOT NULL,
  unidad  VARCHAR(8) NOT NULL,      -- drive letter / mount: 'C', 'D', ...
  fecha   DATE NOT NULL,
  uso     DOUBLE PRECISION NOT NULL -- percent used, 0..100
);
CREATE INDEX idx_hdd_history_fecha ON hdd_history (fecha DESC);
*/

export interface HddHistoryRow {
  equipo: string | null;
  unidad: string | null;
  fecha: string | null;
  uso: number | null;
}


// ═══════════════════════════════════════════════════════════════════════════════
// 2. RESULT TABLES
// ═══════════════════════════════════════════════════════════════════════════════

/*
CREATE TABLE ranking_area_results (
  id                BIGSERIAL PRIMARY KEY,
  run_timestamp     TIMESTAMPTZ NOT NULL,
  domain            ranking_domain NOT NULL,
  area_id           VARCHAR(16) NOT NULL,
  entity_id         VARCHAR(64) NOT NULL,
  metric_kind       metric_kind NOT NULL,
  position          INT NOT NULL,
  normalized_value  DOUBLE PRECISION NOT NULL,   -- 0..100, higher is better
  raw_value         DOUBLE PRECISION NOT NULL,   -- unscaled statistic
  scaled_value      DOUBLE PRECISION NOT NULL,   -- statistic × scale factor
  window_values     JSONB NOT NULL               -- newest first, null padded
);
CREATE INDEX idx_area_results_run ON ranking_area_results (domain, run_timestamp DESC);
*/

export interface AreaResultRow {
  run_timestamp: string;
  domain: string;
  area_id: string;
  entity_id: string;
  metric_kind: string;
  position: number;
  normalized_value: number;
  raw_value: number;
  scaled_value: number;
  window_values: Array<number | null>;
}

/*
CREATE TABLE ranking_composite_results (
  id                  BIGSERIAL PRIMARY KEY,
  run_timestamp       TIMESTAMPTZ NOT NULL,
  domain              ranking_domain NOT NULL,
  position            INT NOT NULL,
  entity_id           VARCHAR(64) NOT NULL,
  final_score         NUMERIC(5,2) NOT NULL,
  category            VARCHAR(32) NOT NULL,
  explanation         TEXT NOT NULL,
  recommendation_text TEXT NOT NULL,
  contributing_areas  TEXT NOT NULL      -- JSON array, e.g. '["CPLOAD","IOLOAD"]'
);
CREATE INDEX idx_composite_results_run ON ranking_composite_results (domain, run_timestamp DESC);
*/

export interface CompositeResultRow {
  run_timestamp: string;
  domain: string;
  position: number;
  entity_id: string;
  final_score: number;
  category: string;
  explanation: string;
  recommendation_text: string;
  contributing_areas: string;
}

/*
CREATE TABLE ranking_comparisons (
  id             BIGSERIAL PRIMARY KEY,
  run_timestamp  TIMESTAMPTZ NOT NULL,
  row_kind       comparison_row_kind NOT NULL,
  row_key        VARCHAR(32) NOT NULL,        -- 'mean', 'std', ... or a category label
  left_label     VARCHAR(32) NOT NULL,
  right_label    VARCHAR(32) NOT NULL,
  left_value     DOUBLE PRECISION,
  right_value    DOUBLE PRECISION,
  combined_value DOUBLE PRECISION             -- delta for stats, total for categories
);
*/

export interface ComparisonResultDbRow {
  run_timestamp: string;
  row_kind: ComparisonRowKind;
  row_key: string;
  left_label: string;
  right_label: string;
  left_value: number | null;
  right_value: number | null;
  combined_value: number | null;
}

/*
CREATE TABLE ranking_unified_results (
  id             BIGSERIAL PRIMARY KEY,
  run_timestamp  TIMESTAMPTZ NOT NULL,
  position       INT NOT NULL,
  entity_id      VARCHAR(64) NOT NULL,
  unified_score  NUMERIC(5,2) NOT NULL,
  category       VARCHAR(32) NOT NULL,
  cp_score       NUMERIC(5,2),
  hdd_score      NUMERIC(5,2),
  domains        TEXT NOT NULL             -- JSON array, e.g. '["cp","hdd"]'
);
*/

export interface UnifiedResultRow {
  run_timestamp: string;
  position: number;
  entity_id: string;
  unified_score: number;
  category: string;
  cp_score: number | null;
  hdd_score: number | null;
  domains: string;
}
