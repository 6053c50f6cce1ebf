import type { AreaRankingRow, CompositeRankingRow, ComparisonResult } from '../types/ranking';
import { roundScore } from '../types/ranking';
import { encodeAreaList } from './listCodec';

type Cell = string | number | null;

const escapeCsv = (value: Cell) => {
  const raw = value === null ? '' : String(value);
  if (raw.includes(',') || raw.includes('"') || raw.includes('\n') || raw.includes('\r')) {
    return `"${raw.replace(/"/g, '""')}"`;
  }
  return raw;
};

export const toCsv = (rows: Cell[][]) =>
  rows.map((row) => row.map(escapeCsv).join(',')).join('\n');

/** One column per window slot, newest first */
export const buildAreaRankingCsv = (rows: readonly AreaRankingRow[], windowSize: number) => {
  const header: Cell[] = [
    'area_id',
    'entity_id',
    'metric_kind',
    'position',
    'normalized_value',
    'raw_value',
    'scaled_value',
  ];
  for (let i = 1; i <= windowSize; i++) header.push(`value_${i}`);
  header.push('run_timestamp');

  const out: Cell[][] = [header];
  rows.forEach((row) => {
    const window: Cell[] = [];
    for (let i = 0; i < windowSize; i++) window.push(row.raw_window_values[i] ?? null);
    out.push([
      row.area_id,
      row.entity_id,
      row.metric_kind,
      row.position,
      roundScore(row.normalized_value),
      row.raw_value,
      row.scaled_value,
      ...window,
      row.run_timestamp,
    ]);
  });
  return toCsv(out);
};

export const buildCompositeCsv = (rows: readonly CompositeRankingRow[]) => {
  const out: Cell[][] = [
    ['position', 'entity_id', 'final_score', 'category', 'explanation', 'recommendation_text', 'contributing_areas'],
  ];
  rows.forEach((row) => {
    out.push([
      row.position,
      row.entity_id,
      roundScore(row.final_score),
      row.category,
      row.explanation,
      row.recommendation_text,
      encodeAreaList(row.contributing_areas),
    ]);
  });
  return toCsv(out);
};

/** Stats table followed by a blank line and the category matrix */
export const buildComparisonCsv = (result: ComparisonResult) => {
  const [left, right] = result.labels;
  const round = (value: number | null) => (value === null ? null : roundScore(value));

  const stats: Cell[][] = [['metric', left, right, 'delta']];
  result.stats.forEach((row) => {
    stats.push([row.metric, round(row.left), round(row.right), round(row.delta)]);
  });

  const categories: Cell[][] = [['category', left, right, 'total']];
  result.categories.forEach((row) => {
    categories.push([row.category, row.left, row.right, row.total]);
  });

  return `${toCsv(stats)}\n\n${toCsv(categories)}`;
};
