import { UnsupportedFilterError } from '../../errors.js';
import type { FilterVisitor } from '../compiler.js';
import type { RangeBounds, ScalarValue } from '../expr.js';

export type QdrantFieldCondition =
  | { key: string; match: { value: string | number | boolean } }
  | { key: string; match: { any: (string | number)[] } }
  | { key: string; range: { gt?: number; gte?: number; lt?: number; lte?: number } };

export interface QdrantFilter {
  must?: QdrantCondition[];
  should?: QdrantCondition[];
  must_not?: QdrantCondition[];
}

export type QdrantCondition = QdrantFieldCondition | QdrantFilter;

function matchable(field: string, value: ScalarValue): string | number | boolean {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new UnsupportedFilterError('qdrant', 'eq', `exact match on non-integer number for ${field}`);
  }
  return value;
}

function keyword(field: string, value: ScalarValue): string | number {
  if (typeof value === 'boolean') {
    throw new UnsupportedFilterError('qdrant', 'in', `boolean membership for ${field}`);
  }
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new UnsupportedFilterError('qdrant', 'in', `non-integer membership for ${field}`);
  }
  return value;
}

function numericBounds(field: string, bounds: RangeBounds): { gt?: number; gte?: number; lt?: number; lte?: number } {
  const out: { gt?: number; gte?: number; lt?: number; lte?: number } = {};
  for (const key of ['gt', 'gte', 'lt', 'lte'] as const) {
    const v = bounds[key];
    if (v === undefined) continue;
    if (typeof v !== 'number') {
      throw new UnsupportedFilterError('qdrant', 'range', `string bound on ${field}`);
    }
    out[key] = v;
  }
  return out;
}

export function toQdrantFilter(condition: QdrantCondition): QdrantFilter {
  return 'key' in condition ? { must: [condition] } : condition;
}

/**
 * Qdrant payload filters. Substring matching needs a full-text payload index, which
 * collections created here do not have, so `contains` is left out.
 */
export const qdrantFilterVisitor: FilterVisitor<QdrantCondition> = {
  backend: 'qdrant',
  eq: (field, value) => ({ key: field, match: { value: matchable(field, value) } }),
  in: (field, values) => ({ key: field, match: { any: values.map(v => keyword(field, v)) } }),
  range: (field, bounds) => ({ key: field, range: numericBounds(field, bounds) }),
  and: parts => ({ must: parts }),
  or: parts => ({ should: parts }),
  not: part => ({ must_not: [part] }),
};
