// ═══════════════════════════════════════════════════════════════════════════════
// CATEGORIZER — Score → quality label
// ═══════════════════════════════════════════════════════════════════════════════
//
// DEFAULT BANDS (evaluated highest-first, inclusive lower bounds):
//   ≥90 → Excelente
//   ≥75 → Muy Bueno
//   ≥60 → Bueno
//   ≥40 → Regular
//   <40 → Necesita Mejora
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { CategoryLabel, CompositeScore } from '../types/ranking';
import { emptyCategoryCounts } from '../types/ranking';
import type { CategoryBand } from './config';
import { DEFAULT_CATEGORY_BANDS } from './config';

export function categorize(score: number, bands: readonly CategoryBand[] = DEFAULT_CATEGORY_BANDS): CategoryLabel {
  for (const band of bands) {
    if (score >= band.min) return band.label;
  }
  // Validated bands end at 0; scores are clamped to [0, 100]
  return bands[bands.length - 1].label;
}

export function countCategories(scores: ReadonlyArray<Pick<CompositeScore, 'category'>>): Record<CategoryLabel, number> {
  const counts = emptyCategoryCounts();
  for (const { category } of scores) counts[category]++;
  return counts;
}
