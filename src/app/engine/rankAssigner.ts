// ═══════════════════════════════════════════════════════════════════════════════
// RANK ASSIGNER — Deterministic total order
// ═══════════════════════════════════════════════════════════════════════════════
//
//   ORDER BY score DESC, entity_id ASC  →  position 1..N
//
// entity_id compares by UTF-16 code units, never by locale, so the same input
// always produces the same ranking on every machine. Equal scores still get
// distinct consecutive positions.
//
// ═══════════════════════════════════════════════════════════════════════════════

/** Code-unit lexical comparison */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface Rankable {
  entity_id: string;
  score: number;
}

export type Ranked<T> = T & { position: number };

export function compareByScore(a: Rankable, b: Rankable): number {
  return b.score - a.score || compareIds(a.entity_id, b.entity_id);
}

/**
 * Sort a copy of `items` and attach positions starting at 1.
 * The input array is left untouched.
 */
export function assignRanks<T extends Rankable>(items: readonly T[]): Array<Ranked<T>> {
  return [...items]
    .sort(compareByScore)
    .map((item, index) => ({ ...item, position: index + 1 }));
}
