import Database from 'better-sqlite3';
import { BackendError, StrataError } from '../errors.js';
import type { SparseVector } from '../embedding/interface.js';
import type { FilterVisitor } from './compiler.js';
import { CollectionAdapter, type NativeQuery } from './adapter.js';
import { sqliteFilterVisitor, type SqlFragment } from './filters/sqlite.js';
import { similarity, sparseDot } from './math.js';
import type { CollectionSchema } from './schema.js';
import type {
  AdapterOptions,
  AggregateGroup,
  DistanceMetric,
  FieldValue,
  Fields,
  IndexMeta,
  QueryHit,
  RemoteCollectionInfo,
  StoredRecord,
} from './types.js';

const META_TABLE = '_strata_collections';

interface MetaRow {
  name: string;
  dimension: number;
  distance: string;
  sparse: number;
}

interface RecordRow {
  id: string;
  vector: string;
  sparse: string | null;
  fields: string;
}

interface GroupRow {
  value: string | number | null;
  type: string;
  n: number;
}

function isDistance(value: string): value is DistanceMetric {
  return value === 'cosine' || value === 'dot' || value === 'l2';
}

function parseFields(json: string): Fields {
  const parsed: unknown = JSON.parse(json);
  const fields: Fields = {};
  if (parsed && typeof parsed === 'object') {
    for (const [key, value] of Object.entries(parsed)) {
      if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        fields[key] = value;
      }
    }
  }
  return fields;
}

function parseVector(json: string): number[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((v): v is number => typeof v === 'number') : [];
}

function parseSparse(json: string | null): SparseVector | undefined {
  if (!json) return undefined;
  const parsed: unknown = JSON.parse(json);
  if (!parsed || typeof parsed !== 'object') return undefined;
  const out: SparseVector = {};
  for (const [term, weight] of Object.entries(parsed)) {
    if (typeof weight === 'number') out[term] = weight;
  }
  return out;
}

function groupValue(row: GroupRow): FieldValue {
  if (row.type === 'true') return true;
  if (row.type === 'false') return false;
  return row.value;
}

/** Open a connection with the pragmas the store relies on. */
export function openSqliteDatabase(path: string): Database.Database {
  const db = new Database(path);
  if (path !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${META_TABLE} (
      name        TEXT PRIMARY KEY,
      dimension   INTEGER NOT NULL,
      distance    TEXT NOT NULL,
      sparse      INTEGER NOT NULL DEFAULT 0,
      index_meta  TEXT NOT NULL,
      created_at  DATETIME NOT NULL DEFAULT (datetime('now'))
    );
  `);
  return db;
}

/**
 * SQLite backend: one table per collection, scalar fields in a JSON column, similarity
 * computed in JS over the filtered rows. Suited to single-node deployments and tests.
 */
export class SqliteCollectionAdapter extends CollectionAdapter<SqlFragment> {
  readonly backend = 'sqlite';
  protected readonly filterVisitor: FilterVisitor<SqlFragment> = sqliteFilterVisitor;
  private readonly table: string;

  constructor(
    options: AdapterOptions,
    private readonly db: Database.Database,
    private readonly ownsConnection = false,
  ) {
    super(options);
    this.table = `vec_${options.collection}`;
  }

  private run<T>(fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof StrataError) throw e;
      throw new BackendError(this.backend, e instanceof Error ? e.message : String(e), undefined, { cause: e });
    }
  }

  private where(filter: SqlFragment | undefined): SqlFragment {
    return filter ? { sql: ` WHERE ${filter.sql}`, params: filter.params } : { sql: '', params: [] };
  }

  protected async describeRemote(): Promise<RemoteCollectionInfo | null> {
    return this.run(() => {
      const row = this.db
        .prepare<[string], MetaRow>(`SELECT name, dimension, distance, sparse FROM ${META_TABLE} WHERE name = ?`)
        .get(this.collectionName);
      if (!row) return null;
      const count = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${this.table}`).get();
      return {
        name: row.name,
        dimension: row.dimension,
        distance: isDistance(row.distance) ? row.distance : this.options.distance,
        sparse: row.sparse === 1,
        count: count?.n ?? 0,
      };
    });
  }

  protected async createRemote(schema: CollectionSchema, indexMeta: IndexMeta): Promise<void> {
    this.run(() =>
      this.db.transaction(() => {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS ${this.table} (
            id      TEXT PRIMARY KEY,
            vector  TEXT NOT NULL,
            sparse  TEXT,
            fields  TEXT NOT NULL
          );
        `);
        for (const field of indexMeta.scalarIndexFields) {
          this.db.exec(
            `CREATE INDEX IF NOT EXISTS idx_${this.table}_${field} ON ${this.table} (json_extract(fields, '$.${field}'))`,
          );
        }
        this.db
          .prepare(`INSERT OR IGNORE INTO ${META_TABLE} (name, dimension, distance, sparse, index_meta) VALUES (?, ?, ?, ?, ?)`)
          .run(schema.name, schema.dimension, schema.distance, schema.sparse ? 1 : 0, JSON.stringify(indexMeta));
      })(),
    );
  }

  protected async dropRemote(): Promise<void> {
    this.run(() =>
      this.db.transaction(() => {
        this.db.exec(`DROP TABLE IF EXISTS ${this.table}`);
        this.db.prepare(`DELETE FROM ${META_TABLE} WHERE name = ?`).run(this.collectionName);
      })(),
    );
  }

  protected async writeRecords(records: StoredRecord[]): Promise<void> {
    this.run(() => {
      const stmt = this.db.prepare(
        `INSERT INTO ${this.table} (id, vector, sparse, fields) VALUES (?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET vector = excluded.vector, sparse = excluded.sparse, fields = excluded.fields`,
      );
      this.db.transaction(() => {
        for (const r of records) {
          stmt.run(r.id, JSON.stringify(r.vector ?? []), r.sparseVector ? JSON.stringify(r.sparseVector) : null, JSON.stringify(r.fields));
        }
      })();
    });
  }

  protected async fetchRecords(ids: string[]): Promise<StoredRecord[]> {
    return this.run(() =>
      this.db
        .prepare<string[], RecordRow>(
          `SELECT id, vector, sparse, fields FROM ${this.table} WHERE id IN (${ids.map(() => '?').join(', ')})`,
        )
        .all(...ids)
        .map(row => ({
          id: row.id,
          vector: parseVector(row.vector),
          sparseVector: parseSparse(row.sparse),
          fields: parseFields(row.fields),
        })),
    );
  }

  protected async removeRecords(ids: string[]): Promise<void> {
    this.run(() => {
      this.db.prepare(`DELETE FROM ${this.table} WHERE id IN (${ids.map(() => '?').join(', ')})`).run(...ids);
    });
  }

  protected async removeByFilter(filter: SqlFragment | undefined): Promise<void> {
    const where = this.where(filter);
    this.run(() => {
      this.db.prepare(`DELETE FROM ${this.table}${where.sql}`).run(...where.params);
    });
  }

  protected async countNative(filter: SqlFragment | undefined): Promise<number> {
    const where = this.where(filter);
    return this.run(() => {
      const row = this.db.prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM ${this.table}${where.sql}`).get(...where.params);
      return row?.n ?? 0;
    });
  }

  protected async searchNative(query: NativeQuery<SqlFragment>): Promise<QueryHit[]> {
    const where = this.where(query.filter);
    const rows = this.run(() =>
      this.db
        .prepare<unknown[], RecordRow>(`SELECT id, vector, sparse, fields FROM ${this.table}${where.sql}`)
        .all(...where.params),
    );
    const metric = this.options.distance;
    return rows.map(row => {
      let score = 0;
      if (query.vector) {
        score = similarity(metric, query.vector, parseVector(row.vector));
      } else if (query.sparseVector) {
        const stored = parseSparse(row.sparse);
        score = stored ? sparseDot(query.sparseVector, stored) : 0;
      }
      return { id: row.id, score, fields: parseFields(row.fields) };
    });
  }

  protected async aggregateNative(field: string, filter: SqlFragment | undefined, limit: number): Promise<AggregateGroup[]> {
    const path = `$.${field}`;
    const clauses = ['json_type(fields, ?) IS NOT NULL'];
    const params: (string | number)[] = [path, path, path];
    if (filter) {
      clauses.push(filter.sql);
      params.push(...filter.params);
    }
    params.push(limit);
    const rows = this.run(() =>
      this.db
        .prepare<unknown[], GroupRow>(
          `SELECT json_extract(fields, ?) AS value, json_type(fields, ?) AS type, COUNT(*) AS n
           FROM ${this.table} WHERE ${clauses.join(' AND ')}
           GROUP BY value, type ORDER BY n DESC, value ASC LIMIT ?`,
        )
        .all(...params),
    );
    return rows.map(row => ({ value: groupValue(row), count: row.n }));
  }

  protected async closeResources(): Promise<void> {
    if (this.ownsConnection && this.db.open) this.db.close();
  }
}
