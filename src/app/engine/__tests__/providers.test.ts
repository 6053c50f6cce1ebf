import { describe, it, expect } from 'vitest';

import { HDD_ENGINE_CONFIG, CP_AREA_LABELS } from '../config';
import { MemoryRankingSink, MockRecordSource, createMockRegistry } from '../providers';
import { runRanking } from '../rankingEngine';

describe('MockRecordSource', () => {
  it('generates the same data for the same end date', async () => {
    const a = await new MockRecordSource({ endDate: '2026-03-07' }).fetchRecords('cp');
    const b = await new MockRecordSource({ endDate: '2026-03-07' }).fetchRecords('cp');

    expect(a.ok).toBe(true);
    expect(a.data).toEqual(b.data);
    expect(a.data).toHaveLength(6 * Object.keys(CP_AREA_LABELS).length * 7);
  });

  it('generates HDD usage inside 0..100 for units C and D', async () => {
    const { data } = await new MockRecordSource({ endDate: '2026-03-07', entities: ['EQ-1'] }).fetchRecords('hdd');

    expect(data).toHaveLength(2 * 7);
    expect(new Set(data.map(r => r.area_id))).toEqual(new Set(['C', 'D']));
    expect(data.every(r => r.raw_value >= 0 && r.raw_value <= 100)).toBe(true);
    expect(data[0].date).toBe('2026-03-01');
    expect(data[6].date).toBe('2026-03-07');
  });

  it('filters by the since day', async () => {
    const { data } = await new MockRecordSource({ endDate: '2026-03-07', entities: ['EQ-1'] }).fetchRecords('hdd', '2026-03-06');
    expect(data.map(r => r.date)).toEqual(['2026-03-06', '2026-03-07', '2026-03-06', '2026-03-07']);
  });

  it('fails on request', async () => {
    const result = await new MockRecordSource({ failing: ['cp'] }).fetchRecords('cp');
    expect(result).toMatchObject({ ok: false, data: [], source: 'mock-records', error: 'mock cp source unavailable' });
  });
});

describe('MemoryRankingSink', () => {
  it('stores area and composite rows of a run', async () => {
    const { source } = createMockRegistry({ endDate: '2026-03-07', entities: ['EQ-1', 'EQ-2'] });
    const { data } = await source.fetchRecords('hdd');
    const run = runRanking(data, HDD_ENGINE_CONFIG, { run_timestamp: '2026-03-07T12:00:00.000Z' });
    const sink = new MemoryRankingSink();

    const saved = await sink.saveRun(run);

    expect(saved.data).toBe(run.area_rows.length + run.entries.length);
    expect(sink.compositeRows.map(r => r.entity_id).sort()).toEqual(['EQ-1', 'EQ-2']);
    expect(sink.areaRows.every(r => r.domain === 'hdd')).toBe(true);
  });
});
