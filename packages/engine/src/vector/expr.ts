/**
 * Backend-neutral filter expression tree. Nodes are immutable plain objects; build
 * them with the helpers below.
 */

export type ScalarValue = string | number | boolean;
export type RangeValue = string | number;

export interface RangeBounds {
  gt?: RangeValue;
  gte?: RangeValue;
  lt?: RangeValue;
  lte?: RangeValue;
}

export type FilterExpr =
  | { readonly op: 'eq'; readonly field: string; readonly value: ScalarValue }
  | { readonly op: 'in'; readonly field: string; readonly values: readonly ScalarValue[] }
  | ({ readonly op: 'range'; readonly field: string } & Readonly<RangeBounds>)
  | { readonly op: 'contains'; readonly field: string; readonly substring: string }
  | { readonly op: 'timeRange'; readonly field: string; readonly start?: Date | string | number; readonly end?: Date | string | number }
  | { readonly op: 'and'; readonly conds: readonly FilterExpr[] }
  | { readonly op: 'or'; readonly conds: readonly FilterExpr[] }
  | { readonly op: 'not'; readonly cond: FilterExpr };

export type FilterOp = FilterExpr['op'];

function present(conds: readonly (FilterExpr | undefined | null)[]): FilterExpr[] {
  return conds.filter((c): c is FilterExpr => c !== undefined && c !== null);
}

export function Eq(field: string, value: ScalarValue): FilterExpr {
  return Object.freeze({ op: 'eq', field, value });
}

export function In(field: string, values: readonly ScalarValue[]): FilterExpr {
  return Object.freeze({ op: 'in', field, values: Object.freeze([...values]) });
}

export function Range(field: string, bounds: RangeBounds): FilterExpr {
  return Object.freeze({ op: 'range', field, ...bounds });
}

export function Contains(field: string, substring: string): FilterExpr {
  return Object.freeze({ op: 'contains', field, substring });
}

/** Half-open [start, end) over an epoch-millisecond field. */
export function TimeRange(field: string, start?: Date | string | number, end?: Date | string | number): FilterExpr {
  return Object.freeze({ op: 'timeRange', field, start, end });
}

export function And(conds: readonly (FilterExpr | undefined | null)[]): FilterExpr {
  return Object.freeze({ op: 'and', conds: Object.freeze(present(conds)) });
}

export function Or(conds: readonly (FilterExpr | undefined | null)[]): FilterExpr {
  return Object.freeze({ op: 'or', conds: Object.freeze(present(conds)) });
}

export function Not(cond: FilterExpr): FilterExpr {
  return Object.freeze({ op: 'not', cond });
}
