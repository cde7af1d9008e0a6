import { UnsupportedFilterError, ValidationError } from '../errors.js';
import type { FilterExpr, RangeBounds, RangeValue, ScalarValue } from './expr.js';

/**
 * One emission rule per node kind. Optional members are node kinds the backend cannot
 * express; compiling a tree that uses them fails with UnsupportedFilterError instead
 * of dropping the clause.
 */
export interface FilterVisitor<T> {
  readonly backend: string;
  eq(field: string, value: ScalarValue): T;
  in(field: string, values: readonly ScalarValue[]): T;
  range(field: string, bounds: RangeBounds): T;
  contains?(field: string, substring: string): T;
  and(parts: T[]): T;
  or(parts: T[]): T;
  not(part: T): T;
}

/**
 * `all` compiles to "no filter"; `none` means the filter can never match, and callers
 * answer without contacting the backend.
 */
export type CompiledFilter<T> =
  | { kind: 'all' }
  | { kind: 'none' }
  | { kind: 'native'; native: T };

type Folded =
  | { kind: 'all' }
  | { kind: 'none' }
  | { kind: 'expr'; expr: FilterExpr };

const ALL: Folded = { kind: 'all' };
const NONE: Folded = { kind: 'none' };
const FIELD_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function checkField(field: string): void {
  if (!FIELD_RE.test(field)) {
    throw new ValidationError(`Invalid filter field name: ${JSON.stringify(field)}`);
  }
}

function checkScalar(field: string, value: unknown): void {
  const ok = typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
  if (!ok) throw new ValidationError(`Invalid value for filter field ${field}: ${String(value)}`);
}

function toEpochMs(value: Date | string | number, field: string): number {
  const ms = value instanceof Date ? value.getTime() : typeof value === 'number' ? value : Date.parse(value);
  if (!Number.isFinite(ms)) throw new ValidationError(`Invalid time bound for ${field}: ${String(value)}`);
  return ms;
}

function boundsOf(expr: RangeBounds): RangeBounds {
  const bounds: RangeBounds = {};
  if (expr.gt !== undefined) bounds.gt = expr.gt;
  if (expr.gte !== undefined) bounds.gte = expr.gte;
  if (expr.lt !== undefined) bounds.lt = expr.lt;
  if (expr.lte !== undefined) bounds.lte = expr.lte;
  return bounds;
}

/**
 * Constant-fold the tree: empty `and` matches everything, empty `or` and empty `in`
 * match nothing, and constants propagate through `and`/`or`/`not`. Also validates
 * field names and values, and rewrites `timeRange` into `range`.
 */
export function foldFilter(expr: FilterExpr): Folded {
  switch (expr.op) {
    case 'eq':
      checkField(expr.field);
      checkScalar(expr.field, expr.value);
      return { kind: 'expr', expr };
    case 'in':
      checkField(expr.field);
      for (const v of expr.values) checkScalar(expr.field, v);
      return expr.values.length === 0 ? NONE : { kind: 'expr', expr };
    case 'range': {
      checkField(expr.field);
      const bounds = boundsOf(expr);
      const values = Object.values(bounds).filter((v): v is RangeValue => v !== undefined);
      if (values.length === 0) throw new ValidationError(`Range filter on ${expr.field} has no bounds`);
      for (const v of values) checkScalar(expr.field, v);
      return { kind: 'expr', expr: { op: 'range', field: expr.field, ...bounds } };
    }
    case 'timeRange': {
      checkField(expr.field);
      const bounds: RangeBounds = {};
      if (expr.start !== undefined) bounds.gte = toEpochMs(expr.start, expr.field);
      if (expr.end !== undefined) bounds.lt = toEpochMs(expr.end, expr.field);
      if (bounds.gte === undefined && bounds.lt === undefined) return ALL;
      return { kind: 'expr', expr: { op: 'range', field: expr.field, ...bounds } };
    }
    case 'contains':
      checkField(expr.field);
      return { kind: 'expr', expr };
    case 'and': {
      const parts: FilterExpr[] = [];
      for (const cond of expr.conds) {
        const folded = foldFilter(cond);
        if (folded.kind === 'none') return NONE;
        if (folded.kind === 'expr') parts.push(folded.expr);
      }
      if (parts.length === 0) return ALL;
      const [only] = parts;
      return parts.length === 1 && only ? { kind: 'expr', expr: only } : { kind: 'expr', expr: { op: 'and', conds: parts } };
    }
    case 'or': {
      const parts: FilterExpr[] = [];
      for (const cond of expr.conds) {
        const folded = foldFilter(cond);
        if (folded.kind === 'all') return ALL;
        if (folded.kind === 'expr') parts.push(folded.expr);
      }
      if (parts.length === 0) return NONE;
      const [only] = parts;
      return parts.length === 1 && only ? { kind: 'expr', expr: only } : { kind: 'expr', expr: { op: 'or', conds: parts } };
    }
    case 'not': {
      const inner = foldFilter(expr.cond);
      if (inner.kind === 'all') return NONE;
      if (inner.kind === 'none') return ALL;
      return { kind: 'expr', expr: { op: 'not', cond: inner.expr } };
    }
  }
}

function visit<T>(expr: FilterExpr, visitor: FilterVisitor<T>): T {
  switch (expr.op) {
    case 'eq':
      return visitor.eq(expr.field, expr.value);
    case 'in':
      return visitor.in(expr.field, expr.values);
    case 'range':
      return visitor.range(expr.field, boundsOf(expr));
    case 'contains':
      if (!visitor.contains) throw new UnsupportedFilterError(visitor.backend, 'contains');
      return visitor.contains(expr.field, expr.substring);
    case 'and':
      return visitor.and(expr.conds.map(c => visit(c, visitor)));
    case 'or':
      return visitor.or(expr.conds.map(c => visit(c, visitor)));
    case 'not':
      return visitor.not(visit(expr.cond, visitor));
    case 'timeRange':
      // foldFilter rewrites these; reaching here means the tree was not folded
      throw new UnsupportedFilterError(visitor.backend, 'timeRange', 'unfolded time range');
  }
}

/**
 * The single translation path from FilterExpr to a backend's native filter. Count,
 * query, aggregate and delete-by-filter all go through here.
 */
export function compileFilter<T>(expr: FilterExpr | undefined, visitor: FilterVisitor<T>): CompiledFilter<T> {
  if (!expr) return { kind: 'all' };
  const folded = foldFilter(expr);
  if (folded.kind !== 'expr') return folded;
  return { kind: 'native', native: visit(folded.expr, visitor) };
}
