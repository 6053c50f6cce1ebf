// ═══════════════════════════════════════════════════════════════════════════════
// SUPABASE STORE — PostgREST-backed record source and result sink
// ═══════════════════════════════════════════════════════════════════════════════
//
// READ:  cp_history (equipo, area, fecha, valor)
//        hdd_history (equipo, unidad, fecha, uso)
//        paged by PAGE_SIZE rows, ordered by fecha then equipo
//
// WRITE: ranking_area_results, ranking_composite_results,
//        ranking_comparisons, ranking_unified_results
//        inserted in batches of `writeBatchSize` rows
//
// Every method returns a ProviderResult; Postgres errors never escape as
// exceptions. Table names come from RuntimeConfig.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { ComparisonResult, Domain, MetricRecord, RankingRun } from '../types/ranking';
import type { CpHistoryRow, HddHistoryRow } from '../types/database';
import type { RuntimeConfig, TableNames } from './config';
import type { IRankingSink, IRecordSource, ProviderResult } from './providers';
import { failedResult, okResult } from './providers';
import {
  fromCpRow,
  fromHddRow,
  toAreaResultRows,
  toComparisonRows,
  toCompositeResultRows,
  toUnifiedRows,
} from './rowMappers';
import type { UnifiedRanking } from './unifiedScoring';

/** PostgREST's default max-rows */
export const PAGE_SIZE = 1000;

export interface SupabaseStoreOptions {
  tables: TableNames;
  writeBatchSize: number;
}

export class SupabaseRankingStore implements IRecordSource, IRankingSink {
  name = 'supabase';
  private client: SupabaseClient;
  private options: SupabaseStoreOptions;

  constructor(client: SupabaseClient, options: SupabaseStoreOptions) {
    this.client = client;
    this.options = options;
  }

  // ─── SOURCE ───────────────────────────────────────────────────────────────

  async fetchRecords(domain: Domain, since?: string): Promise<ProviderResult<MetricRecord[]>> {
    try {
      const rows = domain === 'cp'
        ? (await this.fetchAll<CpHistoryRow>(this.options.tables.cpHistory, 'equipo, area, fecha, valor', 'area', since)).map(fromCpRow)
        : (await this.fetchAll<HddHistoryRow>(this.options.tables.hddHistory, 'equipo, unidad, fecha, uso', 'unidad', since)).map(fromHddRow);

      const records = rows.filter((r): r is MetricRecord => r !== null);
      const skipped = rows.length - records.length;
      return okResult(this.name, records, {
        warnings: skipped > 0 ? [`${skipped} ${domain} rows skipped: missing fields`] : undefined,
        meta: { rows_read: rows.length, rows_skipped: skipped },
      });
    } catch (err) {
      return failedResult(this.name, [], err);
    }
  }

  /** Offset paging: (fecha, equipo, areaColumn) is unique, so pages never overlap. */
  private async fetchAll<Row>(table: string, columns: string, areaColumn: string, since?: string): Promise<Row[]> {
    const all: Row[] = [];
    for (let from = 0; ; from += PAGE_SIZE) {
      let query = this.client
        .from(table)
        .select(columns)
        .order('fecha', { ascending: true })
        .order('equipo', { ascending: true })
        .order(areaColumn, { ascending: true });
      if (since !== undefined) query = query.gte('fecha', since);

      const { data, error } = await query.range(from, from + PAGE_SIZE - 1).returns<Row[]>();
      if (error) throw new Error(`Read ${table} failed: ${error.message}`);

      const page = data ?? [];
      all.push(...page);
      if (page.length < PAGE_SIZE) return all;
    }
  }

  async healthCheck(): Promise<boolean> {
    const { error } = await this.client.from(this.options.tables.cpHistory).select('equipo').limit(1);
    return error === null;
  }

  // ─── SINK ─────────────────────────────────────────────────────────────────

  private async insertBatches<Row extends object>(table: string, rows: readonly Row[]): Promise<number> {
    const size = this.options.writeBatchSize;
    let written = 0;
    for (let i = 0; i < rows.length; i += size) {
      const batch = rows.slice(i, i + size);
      const { error } = await this.client.from(table).insert(batch);
      if (error) throw new Error(`Insert into ${table} failed after ${written} rows: ${error.message}`);
      written += batch.length;
    }
    return written;
  }

  async saveRun(run: RankingRun): Promise<ProviderResult<number>> {
    try {
      const area = await this.insertBatches(this.options.tables.areaResults, toAreaResultRows(run));
      const composite = await this.insertBatches(this.options.tables.compositeResults, toCompositeResultRows(run));
      return okResult(this.name, area + composite);
    } catch (err) {
      return failedResult(this.name, 0, err);
    }
  }

  async saveComparison(result: ComparisonResult, runTimestamp: string): Promise<ProviderResult<number>> {
    try {
      return okResult(this.name, await this.insertBatches(this.options.tables.comparisons, toComparisonRows(result, runTimestamp)));
    } catch (err) {
      return failedResult(this.name, 0, err);
    }
  }

  async saveUnified(ranking: UnifiedRanking, runTimestamp: string): Promise<ProviderResult<number>> {
    try {
      return okResult(this.name, await this.insertBatches(this.options.tables.unifiedResults, toUnifiedRows(ranking, runTimestamp)));
    } catch (err) {
      return failedResult(this.name, 0, err);
    }
  }
}

/**
 * Build a store from runtime configuration.
 * `fetchImpl` replaces the global fetch (tests).
 */
export function createSupabaseStore(config: RuntimeConfig, fetchImpl?: typeof fetch): SupabaseRankingStore {
  const client = createClient(config.supabase.url, config.supabase.serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: fetchImpl ? { fetch: fetchImpl } : {},
  });
  return new SupabaseRankingStore(client, {
    tables: config.tables,
    writeBatchSize: config.writeBatchSize,
  });
}
