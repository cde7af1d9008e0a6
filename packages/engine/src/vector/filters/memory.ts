import type { FilterVisitor } from '../compiler.js';
import type { RangeBounds, RangeValue, ScalarValue } from '../expr.js';
import type { Fields } from '../types.js';

export type FieldPredicate = (fields: Fields) => boolean;

function comparable(a: unknown, b: RangeValue): a is RangeValue {
  return (typeof a === 'number' && typeof b === 'number') || (typeof a === 'string' && typeof b === 'string');
}

function inRange(value: unknown, bounds: RangeBounds): boolean {
  if (bounds.gt !== undefined && !(comparable(value, bounds.gt) && value > bounds.gt)) return false;
  if (bounds.gte !== undefined && !(comparable(value, bounds.gte) && value >= bounds.gte)) return false;
  if (bounds.lt !== undefined && !(comparable(value, bounds.lt) && value < bounds.lt)) return false;
  if (bounds.lte !== undefined && !(comparable(value, bounds.lte) && value <= bounds.lte)) return false;
  return true;
}

/**
 * Reference semantics: strict equality, ranges only between values of the same
 * primitive type, missing fields never match a positive predicate.
 */
export const memoryFilterVisitor: FilterVisitor<FieldPredicate> = {
  backend: 'memory',
  eq: (field, value) => fields => fields[field] === value,
  in: (field, values) => {
    const set = new Set<ScalarValue>(values);
    return fields => {
      const v = fields[field];
      return v !== undefined && v !== null && set.has(v);
    };
  },
  range: (field, bounds) => fields => inRange(fields[field], bounds),
  contains: (field, substring) => fields => {
    const v = fields[field];
    return typeof v === 'string' && v.includes(substring);
  },
  and: parts => fields => parts.every(p => p(fields)),
  or: parts => fields => parts.some(p => p(fields)),
  not: part => fields => !part(fields),
};
