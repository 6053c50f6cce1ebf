import { describe, it, expect } from 'vitest';

import type { MetricRecord } from '../../types/ranking';
import { CP_ENGINE_CONFIG, loadRuntimeConfig } from '../config';
import { runRanking } from '../rankingEngine';
import { PAGE_SIZE, createSupabaseStore } from '../supabaseStore';


// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS: in-process PostgREST stand-in
// ═══════════════════════════════════════════════════════════════════════════════

interface Call {
  url: URL;
  method: string;
  body: unknown;
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

function makeFetch(handler: (call: Call) => Response) {
  const calls: Call[] = [];
  const impl: typeof fetch = async (input, init) => {
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    const call = { url: new URL(requestUrl(input)), method: init?.method ?? 'GET', body };
    calls.push(call);
    return handler(call);
  };
  return { impl, calls };
}

const json = (payload: unknown, status = 200) =>
  new Response(JSON.stringify(payload), { status, headers: { 'Content-Type': 'application/json' } });

const runtime = loadRuntimeConfig({
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
  RANKING_WRITE_BATCH_SIZE: '2',
});

function cpRow(equipo: string | null, valor: number) {
  return { equipo, area: 'CPLOAD', fecha: '2026-03-01', valor };
}


// ═══════════════════════════════════════════════════════════════════════════════
// READ
// ═══════════════════════════════════════════════════════════════════════════════

describe('SupabaseRankingStore.fetchRecords', () => {
  it('maps history rows and skips incomplete ones', async () => {
    const { impl, calls } = makeFetch(() => json([cpRow('EQ1', 10), cpRow(null, 3)]));
    const store = createSupabaseStore(runtime, impl);

    const result = await store.fetchRecords('cp', '2026-03-01');

    expect(result.ok).toBe(true);
    expect(result.data).toEqual([{ entity_id: 'EQ1', area_id: 'CPLOAD', date: '2026-03-01', raw_value: 10 }]);
    expect(result.warnings).toEqual(['1 cp rows skipped: missing fields']);
    expect(result.meta).toEqual({ rows_read: 2, rows_skipped: 1 });

    expect(calls).toHaveLength(1);
    const { url } = calls[0];
    expect(url.pathname).toBe('/rest/v1/cp_history');
    expect(url.searchParams.get('select')).toBe('equipo,area,fecha,valor');
    expect(url.searchParams.get('order')).toBe('fecha.asc,equipo.asc,area.asc');
    expect(url.searchParams.get('fecha')).toBe('gte.2026-03-01');
    expect(url.searchParams.get('offset')).toBe('0');
    expect(url.searchParams.get('limit')).toBe(String(PAGE_SIZE));
  });

  it('reads HDD units from hdd_history', async () => {
    const { impl, calls } = makeFetch(() => json([{ equipo: 'EQ1', unidad: 'C', fecha: '2026-03-01', uso: 71.5 }]));
    const store = createSupabaseStore(runtime, impl);

    const result = await store.fetchRecords('hdd');

    expect(result.data).toEqual([{ entity_id: 'EQ1', area_id: 'C', date: '2026-03-01', raw_value: 71.5 }]);
    expect(calls[0].url.pathname).toBe('/rest/v1/hdd_history');
    expect(calls[0].url.searchParams.get('order')).toBe('fecha.asc,equipo.asc,unidad.asc');
    expect(calls[0].url.searchParams.get('fecha')).toBeNull();
  });

  it('follows pages until a short one', async () => {
    const fullPage = Array.from({ length: PAGE_SIZE }, (_, i) => cpRow(`EQ${i}`, i));
    const { impl, calls } = makeFetch(({ url }) => json(url.searchParams.get('offset') === '0' ? fullPage : [cpRow('LAST', 1)]));
    const store = createSupabaseStore(runtime, impl);

    const result = await store.fetchRecords('cp');

    expect(result.data).toHaveLength(PAGE_SIZE + 1);
    expect(calls.map(c => c.url.searchParams.get('offset'))).toEqual(['0', String(PAGE_SIZE)]);
  });

  it('returns a failed result instead of throwing', async () => {
    const { impl } = makeFetch(() => json({ message: 'permission denied', code: '42501', details: null, hint: null }, 401));
    const store = createSupabaseStore(runtime, impl);

    const result = await store.fetchRecords('cp');

    expect(result.ok).toBe(false);
    expect(result.data).toEqual([]);
    expect(result.error).toBe('Read cp_history failed: permission denied');
  });
});


// ═══════════════════════════════════════════════════════════════════════════════
// WRITE
// ═══════════════════════════════════════════════════════════════════════════════

describe('SupabaseRankingStore.saveRun', () => {
  const records: MetricRecord[] = [
    { entity_id: 'EQ1', area_id: 'CPLOAD', date: '2026-03-01', raw_value: 10 },
    { entity_id: 'EQ2', area_id: 'CPLOAD', date: '2026-03-01', raw_value: 20 },
  ];
  const run = runRanking(records, CP_ENGINE_CONFIG, { run_timestamp: '2026-03-10T06:00:00.000Z' });

  it('inserts area and composite rows in batches', async () => {
    const { impl, calls } = makeFetch(() => new Response(null, { status: 201 }));
    const store = createSupabaseStore(runtime, impl);

    const result = await store.saveRun(run);

    // fill + instability for two entities, then two composites
    expect(result).toMatchObject({ ok: true, data: 6 });
    expect(calls.map(c => `${c.method} ${c.url.pathname}`)).toEqual([
      'POST /rest/v1/ranking_area_results',
      'POST /rest/v1/ranking_area_results',
      'POST /rest/v1/ranking_composite_results',
    ]);
    expect(calls[2].body).toMatchObject([
      { entity_id: 'EQ1', position: 1, domain: 'cp', contributing_areas: '["CPLOAD"]' },
      { entity_id: 'EQ2', position: 2, domain: 'cp', contributing_areas: '["CPLOAD"]' },
    ]);
  });

  it('stops at the first failed batch', async () => {
    const { impl, calls } = makeFetch(() => json({ message: 'permission denied', code: '42501', details: null, hint: null }, 401));
    const store = createSupabaseStore(runtime, impl);

    const result = await store.saveRun(run);

    expect(result.ok).toBe(false);
    expect(result.error).toBe('Insert into ranking_area_results failed after 0 rows: permission denied');
    expect(calls).toHaveLength(1);
  });
});

describe('SupabaseRankingStore.healthCheck', () => {
  it('is healthy when the history table answers', async () => {
    const { impl } = makeFetch(() => json([]));
    expect(await createSupabaseStore(runtime, impl).healthCheck()).toBe(true);
  });
});
