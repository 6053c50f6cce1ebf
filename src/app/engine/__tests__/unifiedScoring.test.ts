import { describe, it, expect } from 'vitest';

import type { RankingEntry } from '../../types/ranking';
import { categorize } from '../categorizer';
import { RankingConfigError } from '../errors';
import { unifyRankings } from '../unifiedScoring';


// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function makeEntry(entity_id: string, final_score: number, position = 1): RankingEntry {
  return { position, entity_id, final_score, category: categorize(final_score) };
}

const cp = [makeEntry('EQ1', 80, 1), makeEntry('EQ2', 60, 2)];
const hdd = [makeEntry('EQ3', 90, 1), makeEntry('EQ1', 60, 2)];


// ═══════════════════════════════════════════════════════════════════════════════
// UNIFIED RANKING
// ═══════════════════════════════════════════════════════════════════════════════

describe('unifyRankings', () => {
  it('weights CP 0.45 and HDD 0.55 when both are present', () => {
    const { entries } = unifyRankings({ cp, hdd });
    const eq1 = entries.find(e => e.entity_id === 'EQ1');

    expect(eq1?.unified_score).toBeCloseTo(69, 10);
    expect(eq1?.category).toBe('Bueno');
    expect(eq1?.cp_score).toBe(80);
    expect(eq1?.hdd_score).toBe(60);
    expect(eq1?.domains).toEqual(['cp', 'hdd']);
  });

  it('keeps a single-domain score as is', () => {
    const { entries } = unifyRankings({ cp, hdd });
    const eq2 = entries.find(e => e.entity_id === 'EQ2');
    const eq3 = entries.find(e => e.entity_id === 'EQ3');

    expect(eq2?.unified_score).toBeCloseTo(60, 10);
    expect(eq2).toMatchObject({ hdd_score: null, domains: ['cp'] });
    expect(eq3?.unified_score).toBeCloseTo(90, 10);
    expect(eq3).toMatchObject({ cp_score: null, domains: ['hdd'] });
  });

  it('ranks and counts the unified scores', () => {
    const ranking = unifyRankings({ cp, hdd });
    expect(ranking.entries.map(e => [e.position, e.entity_id])).toEqual([[1, 'EQ3'], [2, 'EQ1'], [3, 'EQ2']]);
    expect(ranking.category_counts).toEqual({
      'Excelente': 1,
      'Muy Bueno': 0,
      'Bueno': 2,
      'Regular': 0,
      'Necesita Mejora': 0,
    });
  });

  it('accepts a missing domain', () => {
    const { entries } = unifyRankings({ hdd });
    expect(entries.map(e => e.entity_id)).toEqual(['EQ3', 'EQ1']);
  });

  it('honours custom weights', () => {
    const { entries } = unifyRankings({ cp, hdd }, { domain_weights: { cp: 1, hdd: 3 } });
    expect(entries.find(e => e.entity_id === 'EQ1')?.unified_score).toBe(65);
  });

  it('rejects non-positive domain weights', () => {
    expect(() => unifyRankings({ cp }, { domain_weights: { cp: 0, hdd: 1 } })).toThrow(RankingConfigError);
  });
});
