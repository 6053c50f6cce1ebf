// ═══════════════════════════════════════════════════════════════════════════════
// UNIFIED SCORE — One cross-domain score per equipment
// ═══════════════════════════════════════════════════════════════════════════════
//
// FORMULA:
//   unified = Σ(w_d × final_score_d) / Σ(w_d)   over the domains d the entity
//                                               was ranked in
//
//   default weights: CP 0.45, HDD 0.55
//
// Domain rankings are matched by entity_id only. An entity ranked in one
// domain keeps that domain's score (weights renormalize); it is never
// penalized for the domain it is missing from.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { CategoryLabel, Domain, RankingEntry } from '../types/ranking';
import { DOMAINS, clampScore } from '../types/ranking';
import { DEFAULT_CATEGORY_BANDS, validateCategoryBands, type CategoryBand } from './config';
import { categorize, countCategories } from './categorizer';
import { RankingConfigError } from './errors';
import { assignRanks } from './rankAssigner';

export const DEFAULT_DOMAIN_WEIGHTS: Readonly<Record<Domain, number>> = {
  cp: 0.45,
  hdd: 0.55,
};

export interface UnifiedOptions {
  domain_weights?: Readonly<Record<Domain, number>>;
  category_bands?: readonly CategoryBand[];
}

export interface UnifiedEntry {
  position: number;
  entity_id: string;
  unified_score: number;
  category: CategoryLabel;
  cp_score: number | null;
  hdd_score: number | null;
  /** Domains the entity was ranked in, in canonical order */
  domains: Domain[];
}

export interface UnifiedRanking {
  entries: UnifiedEntry[];
  category_counts: Record<CategoryLabel, number>;
}

export type DomainEntries = Partial<Record<Domain, readonly RankingEntry[]>>;

function validateDomainWeights(weights: Readonly<Record<Domain, number>>): void {
  for (const domain of DOMAINS) {
    const weight = weights[domain];
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new RankingConfigError(`Domain weight for ${domain} must be positive, got ${weight}`, { domain });
    }
  }
}

/**
 * Combine per-domain rankings into one ranking.
 */
export function unifyRankings(byDomain: DomainEntries, options: UnifiedOptions = {}): UnifiedRanking {
  const weights = options.domain_weights ?? DEFAULT_DOMAIN_WEIGHTS;
  const bands = options.category_bands ?? DEFAULT_CATEGORY_BANDS;
  validateDomainWeights(weights);
  validateCategoryBands(bands);

  const scores = new Map<string, Partial<Record<Domain, number>>>();
  for (const domain of DOMAINS) {
    for (const entry of byDomain[domain] ?? []) {
      const current = scores.get(entry.entity_id) ?? {};
      current[domain] = entry.final_score;
      scores.set(entry.entity_id, current);
    }
  }

  const unscored = Array.from(scores.entries(), ([entity_id, byScore]) => {
    let total = 0;
    let weighted = 0;
    const domains: Domain[] = [];
    for (const domain of DOMAINS) {
      const score = byScore[domain];
      if (score === undefined) continue;
      domains.push(domain);
      total += weights[domain];
      weighted += weights[domain] * score;
    }
    return {
      entity_id,
      score: clampScore(weighted / total),
      cp_score: byScore.cp ?? null,
      hdd_score: byScore.hdd ?? null,
      domains,
    };
  });

  const entries: UnifiedEntry[] = assignRanks(unscored).map(r => ({
    position: r.position,
    entity_id: r.entity_id,
    unified_score: r.score,
    category: categorize(r.score, bands),
    cp_score: r.cp_score,
    hdd_score: r.hdd_score,
    domains: r.domains,
  }));

  return { entries, category_counts: countCategories(entries) };
}
