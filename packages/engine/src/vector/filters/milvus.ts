import { UnsupportedFilterError } from '../../errors.js';
import type { FilterVisitor } from '../compiler.js';
import type { RangeBounds, ScalarValue } from '../expr.js';

export function milvusLiteral(value: ScalarValue): string {
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

const RANGE_OPS: [keyof RangeBounds, string][] = [['gt', '>'], ['gte', '>='], ['lt', '<'], ['lte', '<=']];

/** Milvus boolean expressions, e.g. `(agent_id == "a1" and level in [0, 1])`. */
export const milvusFilterVisitor: FilterVisitor<string> = {
  backend: 'milvus',
  eq: (field, value) => `${field} == ${milvusLiteral(value)}`,
  in: (field, values) => `${field} in [${values.map(milvusLiteral).join(', ')}]`,
  range: (field, bounds) => {
    const clauses: string[] = [];
    for (const [key, op] of RANGE_OPS) {
      const v = bounds[key];
      if (v !== undefined) clauses.push(`${field} ${op} ${milvusLiteral(v)}`);
    }
    return `(${clauses.join(' and ')})`;
  },
  contains: (field, substring) => {
    // LIKE has no escape syntax for its wildcards
    if (/[%_]/.test(substring)) {
      throw new UnsupportedFilterError('milvus', 'contains', 'substring contains a LIKE wildcard (% or _)');
    }
    return `${field} like ${JSON.stringify(`%${substring}%`)}`;
  },
  and: parts => `(${parts.join(' and ')})`,
  or: parts => `(${parts.join(' or ')})`,
  not: part => `not (${part})`,
};
