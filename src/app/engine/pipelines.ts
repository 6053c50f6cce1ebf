// ═══════════════════════════════════════════════════════════════════════════════
// Telemetry Ranking — Batch Job
// ═══════════════════════════════════════════════════════════════════════════════
//
// ARCHITECTURE:
//
//   ┌──────────────────────────────────────────────────────────────────────┐
//   │                          RANKING JOB                                 │
//   │                                                                      │
//   │  ┌──────────────────────────────────────────────────────┐            │
//   │  │           RECORD SOURCE (IRecordSource)              │            │
//   │  │     fetchRecords('cp')        fetchRecords('hdd')    │            │
//   │  └────────────────────────┬─────────────────────────────┘            │
//   │                           ▼                                          │
//   │  ┌──────────────────────────────────────────────────────┐            │
//   │  │              RANKING ENGINE (pure)                   │            │
//   │  │  runRanking(cp)  runRanking(hdd)                     │            │
//   │  │  compareRankings(cp, hdd)   unifyRankings(cp, hdd)   │            │
//   │  └────────────────────────┬─────────────────────────────┘            │
//   │                           ▼                                          │
//   │  ┌──────────────────────────────────────────────────────┐            │
//   │  │              RESULT SINK (IRankingSink)              │            │
//   │  │  → ranking_area_results / ranking_composite_results  │            │
//   │  │  → ranking_comparisons / ranking_unified_results     │            │
//   │  └──────────────────────────────────────────────────────┘            │
//   └──────────────────────────────────────────────────────────────────────┘
//
// JOB FAILURE HANDLING:
//   - A domain whose fetch or save fails is skipped → status: 'partial'
//   - Both domains failed                          → status: 'failed'
//   - Comparison needs both domains; unified needs at least one
//   - RankingConfigError is NOT caught: configuration problems are fatal
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { ComparisonResult, Domain, RankingRun, RunCondition } from '../types/ranking';
import { DOMAINS } from '../types/ranking';
import { DEFAULT_ENGINE_CONFIGS, type EngineConfig } from './config';
import type { ProviderRegistry } from './providers';
import { compareRankings } from './rankingComparator';
import { runRanking } from './rankingEngine';
import { unifyRankings, type UnifiedRanking } from './unifiedScoring';


// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

/** Pipeline logger */
export interface PipelineLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/** `[Tag] message` through console, meta appended when present */
export function createConsoleLogger(tag: string): PipelineLogger {
  const write = (fn: (...args: unknown[]) => void) => (message: string, meta?: Record<string, unknown>) => {
    if (meta) fn(`[${tag}] ${message}`, meta);
    else fn(`[${tag}] ${message}`);
  };
  return {
    info: write(console.log),
    warn: write(console.warn),
    error: write(console.error),
  };
}

/** Log a run's conditions grouped by kind, with a few examples each */
export function logConditions(log: PipelineLogger, domain: Domain, conditions: readonly RunCondition[]): void {
  const byKind = new Map<string, RunCondition[]>();
  for (const c of conditions) {
    const list = byKind.get(c.kind);
    if (list) list.push(c);
    else byKind.set(c.kind, [c]);
  }
  for (const [kind, list] of byKind) {
    log.warn(`${domain.toUpperCase()}: ${list.length} ${kind} condition(s)`, {
      domain,
      kind,
      examples: list.slice(0, 3).map(c => c.message),
    });
  }
}


// ═══════════════════════════════════════════════════════════════════════════════
// JOB EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

export interface PipelineContext {
  /** Record source and result sink */
  registry: ProviderRegistry;
  log: PipelineLogger;
  /** Per-domain engine configuration; the shipped profiles by default */
  configs?: Partial<Record<Domain, EngineConfig>>;
  /** Only read records dated on or after this day */
  since?: string;
  /** Fixed run timestamp; defaults to now */
  run_timestamp?: string;
}

export interface PipelineResult {
  status: 'success' | 'partial' | 'failed';
  message?: string;
  run_timestamp: string;
  rows_fetched: number;
  rows_inserted: number;
  warnings: string[];
  runs: Partial<Record<Domain, RankingRun>>;
  comparison: ComparisonResult | null;
  unified: UnifiedRanking | null;
}

/**
 * Fetch → rank both domains → compare → unify → persist.
 */
export async function runRankingJob(ctx: PipelineContext): Promise<PipelineResult> {
  const { registry, log } = ctx;
  const runTimestamp = ctx.run_timestamp ?? new Date().toISOString();
  const result: PipelineResult = {
    status: 'success',
    run_timestamp: runTimestamp,
    rows_fetched: 0,
    rows_inserted: 0,
    warnings: [],
    runs: {},
    comparison: null,
    unified: null,
  };
  const failures: string[] = [];

  for (const domain of DOMAINS) {
    const config = ctx.configs?.[domain] ?? DEFAULT_ENGINE_CONFIGS[domain];

    const fetched = await registry.source.fetchRecords(domain, ctx.since);
    if (!fetched.ok) {
      failures.push(`${domain} fetch failed: ${fetched.error ?? 'unknown error'}`);
      log.error(`${domain.toUpperCase()} fetch failed`, { source: fetched.source, error: fetched.error });
      continue;
    }
    for (const warning of fetched.warnings ?? []) {
      result.warnings.push(warning);
      log.warn(warning, { domain, source: fetched.source });
    }
    result.rows_fetched += fetched.data.length;

    const run = runRanking(fetched.data, config, { run_timestamp: runTimestamp });
    logConditions(log, domain, run.conditions);
    log.info(`${domain.toUpperCase()}: ranked ${run.entries.length} entities`, {
      records: fetched.data.length,
      excluded: run.excluded_entities.length,
    });

    const saved = await registry.sink.saveRun(run);
    if (!saved.ok) {
      failures.push(`${domain} save failed: ${saved.error ?? 'unknown error'}`);
      log.error(`${domain.toUpperCase()} save failed`, { sink: saved.source, error: saved.error });
      continue;
    }
    result.rows_inserted += saved.data;
    result.runs[domain] = run;
  }

  const { cp, hdd } = result.runs;
  if (cp && hdd) {
    result.comparison = compareRankings(
      { label: 'CP', entries: cp.entries },
      { label: 'HDD', entries: hdd.entries },
    );
    const saved = await registry.sink.saveComparison(result.comparison, runTimestamp);
    if (saved.ok) result.rows_inserted += saved.data;
    else failures.push(`comparison save failed: ${saved.error ?? 'unknown error'}`);
  }

  if (cp || hdd) {
    result.unified = unifyRankings({ cp: cp?.entries, hdd: hdd?.entries });
    const saved = await registry.sink.saveUnified(result.unified, runTimestamp);
    if (saved.ok) result.rows_inserted += saved.data;
    else failures.push(`unified save failed: ${saved.error ?? 'unknown error'}`);
  }

  result.warnings.push(...failures);
  if (!cp && !hdd) {
    result.status = 'failed';
    result.message = 'No domain could be ranked and stored';
  } else if (failures.length > 0) {
    result.status = 'partial';
    result.message = failures.join('; ');
  } else {
    result.message = `Stored ${result.rows_inserted} rows`;
  }

  log.info(`Job ${result.status}`, {
    run_timestamp: runTimestamp,
    rows_fetched: result.rows_fetched,
    rows_inserted: result.rows_inserted,
  });
  return result;
}
