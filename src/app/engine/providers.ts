// ═══════════════════════════════════════════════════════════════════════════════
// Telemetry Ranking — Data Provider Interfaces & Mock Adapters
// ═══════════════════════════════════════════════════════════════════════════════
//
// STRATEGY: "Provider Interface" pattern
//
// Record acquisition and result persistence each have a typed interface.
// Implementations can be:
//   - Mock / Memory:  deterministic data and in-process storage
//   - Supabase:       PostgREST tables (see supabaseStore.ts)
//
// This allows:
//   1. Development without database credentials
//   2. Testing the batch job with known data
//   3. Swapping storage without touching the engine
//
// PROVIDER LIFECYCLE:
//   1. The job asks the source for each domain's records
//   2. The engine ranks them (pure, no I/O)
//   3. The job hands runs, comparison and unified ranking to the sink
//
// Providers never throw to the job: failures come back as `ok: false`.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { ComparisonResult, Domain, MetricRecord, RankingRun } from '../types/ranking';
import type {
  AreaResultRow,
  ComparisonResultDbRow,
  CompositeResultRow,
  UnifiedResultRow,
} from '../types/database';
import { CP_AREA_LABELS } from './config';
import { toAreaResultRows, toComparisonRows, toCompositeResultRows, toUnifiedRows } from './rowMappers';
import type { UnifiedRanking } from './unifiedScoring';


// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Telemetry record source, one call per domain.
 *
 * Implementations:
 *   - MockRecordSource (below)
 *   - SupabaseRankingStore (cp_history / hdd_history tables)
 */
export interface IRecordSource {
  name: string;

  /** Records dated on or after `since` (YYYY-MM-DD), or all when omitted */
  fetchRecords(domain: Domain, since?: string): Promise<ProviderResult<MetricRecord[]>>;

  healthCheck(): Promise<boolean>;
}

/**
 * Result sink. Each call reports the number of rows written.
 *
 * Implementations:
 *   - MemoryRankingSink (below)
 *   - SupabaseRankingStore (ranking_* tables)
 */
export interface IRankingSink {
  name: string;

  saveRun(run: RankingRun): Promise<ProviderResult<number>>;

  saveComparison(result: ComparisonResult, runTimestamp: string): Promise<ProviderResult<number>>;

  saveUnified(ranking: UnifiedRanking, runTimestamp: string): Promise<ProviderResult<number>>;
}


// ═══════════════════════════════════════════════════════════════════════════════
// SHARED TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Standard result envelope from any provider */
export interface ProviderResult<T> {
  ok: boolean;
  data: T;
  source: string;
  fetched_at: string;
  /** Set when ok is false */
  error?: string;
  /** Partial success: some items were skipped */
  warnings?: string[];
  /** Provider-specific metadata */
  meta?: Record<string, unknown>;
}

export function okResult<T>(source: string, data: T, extra: Partial<ProviderResult<T>> = {}): ProviderResult<T> {
  return { ok: true, data, source, fetched_at: new Date().toISOString(), ...extra };
}

export function failedResult<T>(source: string, data: T, error: unknown): ProviderResult<T> {
  return {
    ok: false,
    data,
    source,
    fetched_at: new Date().toISOString(),
    error: error instanceof Error ? error.message : String(error),
  };
}


// ═══════════════════════════════════════════════════════════════════════════════
// MOCK PROVIDERS — Deterministic test data
// ═══════════════════════════════════════════════════════════════════════════════

// ─── MOCK RECORD SOURCE ─────────────────────────────────────────────────────

export interface MockRecordSourceOptions {
  /** Fixed records per domain; generated data is used for a domain left out */
  fixtures?: Partial<Record<Domain, readonly MetricRecord[]>>;
  entities?: string[];
  days?: number;
  /** Last generated date, YYYY-MM-DD */
  endDate?: string;
  /** Domains whose fetch fails, for exercising partial runs */
  failing?: Domain[];
}

const DEFAULT_MOCK_ENTITIES = ['EQ-001', 'EQ-002', 'EQ-003', 'EQ-004', 'EQ-005', 'EQ-006'];
const MOCK_HDD_UNITS = ['C', 'D'];

export class MockRecordSource implements IRecordSource {
  name = 'mock-records';
  private options: MockRecordSourceOptions;

  constructor(options: MockRecordSourceOptions = {}) {
    this.options = options;
  }

  async fetchRecords(domain: Domain, since?: string): Promise<ProviderResult<MetricRecord[]>> {
    if (this.options.failing?.includes(domain)) {
      return failedResult(this.name, [], new Error(`mock ${domain} source unavailable`));
    }

    const records = [...(this.options.fixtures?.[domain] ?? this.generate(domain))];
    const data = since === undefined ? records : records.filter(r => r.date.slice(0, 10) >= since);
    return okResult(this.name, data);
  }

  private generate(domain: Domain): MetricRecord[] {
    const entities = this.options.entities ?? DEFAULT_MOCK_ENTITIES;
    const days = this.options.days ?? 7;
    const end = new Date(`${this.options.endDate ?? new Date().toISOString().slice(0, 10)}T00:00:00Z`);
    const areas = domain === 'cp' ? Object.keys(CP_AREA_LABELS) : MOCK_HDD_UNITS;

    const records: MetricRecord[] = [];
    for (const entity of entities) {
      for (const area of areas) {
        const seed = hashString(`${domain}:${entity}:${area}`);
        const base = domain === 'hdd' ? 20 + (seed % 60) : 1 + (seed % 500) / 10;
        for (let i = days - 1; i >= 0; i--) {
          const day = new Date(end);
          day.setUTCDate(end.getUTCDate() - i);
          const wobble = Math.sin((seed + i) * 0.7) * (domain === 'hdd' ? 3 : base * 0.1);
          const value = Math.round((base + wobble) * 100) / 100;
          records.push({
            entity_id: entity,
            area_id: area,
            date: day.toISOString().slice(0, 10),
            raw_value: domain === 'hdd' ? Math.min(100, Math.max(0, value)) : value,
          });
        }
      }
    }
    return records;
  }

  async healthCheck(): Promise<boolean> { return true; }
}


// ─── MEMORY SINK ─────────────────────────────────────────────────────────────

export class MemoryRankingSink implements IRankingSink {
  name = 'memory-sink';
  areaRows: AreaResultRow[] = [];
  compositeRows: CompositeResultRow[] = [];
  comparisonRows: ComparisonResultDbRow[] = [];
  unifiedRows: UnifiedResultRow[] = [];
  private failing: Set<Domain>;

  constructor(options: { failing?: Domain[] } = {}) {
    this.failing = new Set(options.failing ?? []);
  }

  async saveRun(run: RankingRun): Promise<ProviderResult<number>> {
    if (this.failing.has(run.domain)) {
      return failedResult(this.name, 0, new Error(`memory sink rejects ${run.domain}`));
    }
    const area = toAreaResultRows(run);
    const composite = toCompositeResultRows(run);
    this.areaRows.push(...area);
    this.compositeRows.push(...composite);
    return okResult(this.name, area.length + composite.length);
  }

  async saveComparison(result: ComparisonResult, runTimestamp: string): Promise<ProviderResult<number>> {
    const rows = toComparisonRows(result, runTimestamp);
    this.comparisonRows.push(...rows);
    return okResult(this.name, rows.length);
  }

  async saveUnified(ranking: UnifiedRanking, runTimestamp: string): Promise<ProviderResult<number>> {
    const rows = toUnifiedRows(ranking, runTimestamp);
    this.unifiedRows.push(...rows);
    return okResult(this.name, rows.length);
  }
}


// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export interface ProviderRegistry {
  source: IRecordSource;
  sink: IRankingSink;
}

/** Default: mock source and in-memory sink for development */
export function createMockRegistry(options: MockRecordSourceOptions = {}): ProviderRegistry {
  return {
    source: new MockRecordSource(options),
    sink: new MemoryRankingSink(),
  };
}


// ═══════════════════════════════════════════════════════════════════════════════
// UTILITY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function hashString(str: string): number {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash) + str.charCodeAt(i);
    hash = hash & 0x7FFFFFFF;  // Keep positive
  }
  return hash;
}
