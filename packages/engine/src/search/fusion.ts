import type { Fields, QueryHit } from '../vector/types.js';

export type FusionStrategy = 'linear' | 'rrf';

export interface FusionOptions {
  strategy: FusionStrategy;
  /** Contribution of the sparse signal. Zero (or no sparse hits) means dense pass-through. */
  sparseWeight: number;
  /** RRF damping constant. */
  rrfK: number;
}

export interface FusedHit {
  id: string;
  score: number;
  denseScore?: number;
  sparseScore?: number;
  fields: Fields;
}

/**
 * Combine dense and sparse hit lists into one score per record.
 *
 *   linear: dense + w * sparse            (a missing side counts as 0)
 *   rrf:    1/(k + rank_dense) + w/(k + rank_sparse)
 *
 * Without sparse input the dense scores pass through unchanged, whatever the strategy.
 * Inputs are expected in the adapter's order (score desc, id asc); ranks follow it.
 */
export function fuseHits(dense: QueryHit[], sparse: QueryHit[], opts: FusionOptions): FusedHit[] {
  if (opts.sparseWeight <= 0 || sparse.length === 0) {
    return dense.map(h => ({ id: h.id, score: h.score, denseScore: h.score, fields: h.fields }));
  }

  const merged = new Map<string, FusedHit>();
  const denseRank = new Map<string, number>();
  const sparseRank = new Map<string, number>();

  dense.forEach((h, i) => {
    denseRank.set(h.id, i + 1);
    merged.set(h.id, { id: h.id, score: 0, denseScore: h.score, fields: h.fields });
  });
  sparse.forEach((h, i) => {
    sparseRank.set(h.id, i + 1);
    const existing = merged.get(h.id);
    if (existing) existing.sparseScore = h.score;
    else merged.set(h.id, { id: h.id, score: 0, sparseScore: h.score, fields: h.fields });
  });

  const w = opts.sparseWeight;
  for (const hit of merged.values()) {
    if (opts.strategy === 'rrf') {
      const dr = denseRank.get(hit.id);
      const sr = sparseRank.get(hit.id);
      hit.score = (dr ? 1 / (opts.rrfK + dr) : 0) + (sr ? w / (opts.rrfK + sr) : 0);
    } else {
      hit.score = (hit.denseScore ?? 0) + w * (hit.sparseScore ?? 0);
    }
  }
  return [...merged.values()];
}
