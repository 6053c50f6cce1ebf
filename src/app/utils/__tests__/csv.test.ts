import { describe, it, expect } from 'vitest';

import type { AreaRankingRow, ComparisonResult, CompositeRankingRow } from '../../types/ranking';
import { buildAreaRankingCsv, buildComparisonCsv, buildCompositeCsv, toCsv } from '../csv';

describe('toCsv', () => {
  it('quotes cells with separators, quotes or newlines', () => {
    expect(toCsv([['a', 'b,c'], ['say "hi"', null], ['line\nbreak', 3]]))
      .toBe('a,"b,c"\n"say ""hi""",\n"line\nbreak",3');
  });
});

describe('buildCompositeCsv', () => {
  it('rounds scores and encodes contributing areas as JSON', () => {
    const row: CompositeRankingRow = {
      position: 1,
      entity_id: 'EQ-1',
      final_score: 85.714285,
      category: 'Muy Bueno',
      explanation: 'Carga baja, estable',
      recommendation_text: 'Mantener',
      contributing_areas: ['A', 'B'],
    };
    const [header, line] = buildCompositeCsv([row]).split('\n');

    expect(header).toBe('position,entity_id,final_score,category,explanation,recommendation_text,contributing_areas');
    expect(line).toBe('1,EQ-1,85.71,Muy Bueno,"Carga baja, estable",Mantener,"[""A"",""B""]"');
  });
});

describe('buildAreaRankingCsv', () => {
  it('writes one column per window slot', () => {
    const row: AreaRankingRow = {
      area_id: 'CPLOAD',
      entity_id: 'EQ-1',
      metric_kind: 'instability',
      position: 1,
      normalized_value: 100,
      raw_value: 0.002,
      scaled_value: 2,
      raw_window_values: [5, null, null],
      run_timestamp: '2026-03-01T00:00:00.000Z',
    };

    expect(buildAreaRankingCsv([row], 3).split('\n')).toEqual([
      'area_id,entity_id,metric_kind,position,normalized_value,raw_value,scaled_value,value_1,value_2,value_3,run_timestamp',
      'CPLOAD,EQ-1,instability,1,100,0.002,2,5,,,2026-03-01T00:00:00.000Z',
    ]);
  });
});

describe('buildComparisonCsv', () => {
  it('writes the stats table, a blank line and the category table', () => {
    const result: ComparisonResult = {
      labels: ['CP', 'HDD'],
      stats: [
        { metric: 'count', left: 2, right: 3, delta: 1 },
        { metric: 'mean', left: 60, right: 70.123, delta: 10.123 },
        { metric: 'max', left: null, right: null, delta: null },
      ],
      categories: [{ category: 'Excelente', left: 1, right: 0, total: 1 }],
    };

    expect(buildComparisonCsv(result)).toBe(
      'metric,CP,HDD,delta\ncount,2,3,1\nmean,60,70.12,10.12\nmax,,,\n\ncategory,CP,HDD,total\nExcelente,1,0,1',
    );
  });
});
