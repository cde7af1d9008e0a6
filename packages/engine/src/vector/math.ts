import type { SparseVector } from '../embedding/interface.js';
import type { DistanceMetric } from './types.js';

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const denom = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
  return denom === 0 ? 0 : dot(a, b) / denom;
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/** Maps a distance to a similarity in (0, 1]. */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}

/** Similarity under `metric`, higher is closer. */
export function similarity(metric: DistanceMetric, a: readonly number[], b: readonly number[]): number {
  switch (metric) {
    case 'cosine':
      return cosineSimilarity(a, b);
    case 'dot':
      return dot(a, b);
    case 'l2':
      return distanceToScore(euclideanDistance(a, b));
  }
}

export function sparseDot(a: SparseVector, b: SparseVector): number {
  const [small, large] = Object.keys(a).length <= Object.keys(b).length ? [a, b] : [b, a];
  let sum = 0;
  for (const [term, weight] of Object.entries(small)) {
    const other = large[term];
    if (other !== undefined) sum += weight * other;
  }
  return sum;
}

/** 32-bit FNV-1a over the UTF-8 bytes of `term`. */
export function fnv1a32(term: string): number {
  let hash = 0x811c9dc5;
  for (const byte of new TextEncoder().encode(term)) {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export interface ProjectedSparse {
  indices: number[];
  values: number[];
}

/**
 * Project a term-weight map onto uint32 indices for stores that only take integer
 * sparse dimensions. Colliding terms are summed; indices come out ascending.
 */
export function projectSparse(vector: SparseVector): ProjectedSparse {
  const merged = new Map<number, number>();
  for (const [term, weight] of Object.entries(vector)) {
    const index = fnv1a32(term);
    merged.set(index, (merged.get(index) ?? 0) + weight);
  }
  const indices = [...merged.keys()].sort((a, b) => a - b);
  return { indices, values: indices.map(i => merged.get(i) ?? 0) };
}
