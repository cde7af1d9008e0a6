import type { FilterVisitor } from '../compiler.js';
import type { RangeBounds, ScalarValue } from '../expr.js';

export interface SqlFragment {
  sql: string;
  params: (string | number)[];
}

/** better-sqlite3 cannot bind booleans; JSON booleans read back as 1/0. */
function bind(value: ScalarValue): string | number {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

function path(field: string): string {
  return `$.${field}`;
}

const RANGE_OPS: [keyof RangeBounds, string][] = [['gt', '>'], ['gte', '>='], ['lt', '<'], ['lte', '<=']];

/**
 * Scalar fields live in a JSON column. NOT coalesces unknown (NULL) to false first so
 * a missing field behaves like the in-memory reference: `not(eq(f, x))` matches it.
 */
export const sqliteFilterVisitor: FilterVisitor<SqlFragment> = {
  backend: 'sqlite',
  eq: (field, value) => ({ sql: 'json_extract(fields, ?) = ?', params: [path(field), bind(value)] }),
  in: (field, values) => ({
    sql: `json_extract(fields, ?) IN (${values.map(() => '?').join(', ')})`,
    params: [path(field), ...values.map(bind)],
  }),
  range: (field, bounds) => {
    const clauses: string[] = [];
    const params: (string | number)[] = [];
    for (const [key, op] of RANGE_OPS) {
      const v = bounds[key];
      if (v === undefined) continue;
      // SQLite orders every number before every text value; compare like types only
      const types = typeof v === 'number' ? "('integer', 'real')" : "('text')";
      clauses.push(`(json_type(fields, ?) IN ${types} AND json_extract(fields, ?) ${op} ?)`);
      params.push(path(field), path(field), v);
    }
    return { sql: `(${clauses.join(' AND ')})`, params };
  },
  contains: (field, substring) => ({
    sql: "(json_type(fields, ?) = 'text' AND instr(json_extract(fields, ?), ?) > 0)",
    params: [path(field), path(field), substring],
  }),
  and: parts => ({ sql: `(${parts.map(p => p.sql).join(' AND ')})`, params: parts.flatMap(p => p.params) }),
  or: parts => ({ sql: `(${parts.map(p => p.sql).join(' OR ')})`, params: parts.flatMap(p => p.params) }),
  not: part => ({ sql: `(NOT COALESCE(${part.sql}, 0))`, params: part.params }),
};
