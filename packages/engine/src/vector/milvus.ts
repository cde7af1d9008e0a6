import { z } from 'zod';
import { BackendError } from '../errors.js';
import type { FilterVisitor } from './compiler.js';
import { CollectionAdapter, type NativeQuery } from './adapter.js';
import { milvusFilterVisitor, milvusLiteral } from './filters/milvus.js';
import { HttpJsonClient } from './http.js';
import { distanceToScore, projectSparse } from './math.js';
import type { CollectionSchema, ScalarFieldSpec, ScalarType } from './schema.js';
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

const VECTOR_FIELD = 'vector';
const SPARSE_FIELD = 'sparse_vector';
const PRIMARY_FIELD = 'id';
/** Milvus caps offset + limit of a query at this window. */
const QUERY_WINDOW = 16384;
const HIDDEN_KEYS = new Set([PRIMARY_FIELD, VECTOR_FIELD, SPARSE_FIELD, 'distance', '$meta']);

const METRIC_NAMES: Record<DistanceMetric, string> = { cosine: 'COSINE', dot: 'IP', l2: 'L2' };

const DATA_TYPES: Record<ScalarType, string> = {
  string: 'VarChar',
  int64: 'Int64',
  float: 'Double',
  bool: 'Bool',
  date_time: 'Int64',
};

const TYPE_DEFAULTS: Record<string, FieldValue> = { VarChar: '', Int64: 0, Double: 0, Float: 0, Bool: false };

const EnvelopeSchema = z.object({ code: z.number(), message: z.string().optional(), data: z.unknown().optional() });

const HasSchema = z.object({ has: z.boolean() });

const DescribeSchema = z.object({
  fields: z.array(
    z.object({
      name: z.string(),
      type: z.string(),
      params: z.array(z.object({ key: z.string(), value: z.union([z.string(), z.number()]) })).optional(),
    }),
  ),
  indexes: z.array(z.object({ fieldName: z.string(), metricType: z.string().optional() })).optional(),
});

const RowSchema = z.record(z.unknown());
const RowsSchema = z.array(RowSchema);

function metricOf(name: string | undefined): DistanceMetric {
  if (name === 'IP') return 'dot';
  if (name === 'L2') return 'l2';
  return 'cosine';
}

function scalarFields(row: Record<string, unknown>): Fields {
  const fields: Fields = {};
  for (const [key, value] of Object.entries(row)) {
    if (HIDDEN_KEYS.has(key)) continue;
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      fields[key] = value;
    }
  }
  return fields;
}

function rowId(row: Record<string, unknown>): string {
  const id = row[PRIMARY_FIELD];
  return typeof id === 'string' || typeof id === 'number' ? String(id) : '';
}

export interface MilvusAdapterOptions extends AdapterOptions {
  url: string;
  apiKey?: string;
}

/**
 * Milvus over the v2 REST API. Scalar fields of the schema become typed columns (every
 * other field lands in the dynamic field); filters are boolean expressions.
 */
export class MilvusCollectionAdapter extends CollectionAdapter<string> {
  readonly backend = 'milvus';
  protected readonly filterVisitor: FilterVisitor<string> = milvusFilterVisitor;
  private readonly http: HttpJsonClient;
  /** Typed columns and the value a record gets when it leaves one out. */
  private columnDefaults = new Map<string, FieldValue>();

  constructor(options: MilvusAdapterOptions) {
    super(options);
    this.http = new HttpJsonClient({
      backend: this.backend,
      baseUrl: options.url,
      headers: options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {},
      timeoutMs: options.timeoutMs,
      retries: options.retries,
    });
  }

  /** Milvus answers 200 with a non-zero `code` on failure. */
  private async call(path: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const res = await this.http.request(`/v2/vectordb/${path}`, {
      signal,
      body: { collectionName: this.collectionName, ...body },
    });
    const envelope = EnvelopeSchema.safeParse(res.data);
    if (!envelope.success) throw new BackendError(this.backend, `Unexpected ${path} response`);
    if (envelope.data.code !== 0) {
      throw new BackendError(this.backend, `${path} failed (code ${envelope.data.code}): ${envelope.data.message ?? ''}`);
    }
    return envelope.data.data;
  }

  private async rows(path: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<Record<string, unknown>[]> {
    const parsed = RowsSchema.safeParse((await this.call(path, body, signal)) ?? []);
    if (!parsed.success) throw new BackendError(this.backend, `Unexpected ${path} rows`);
    return parsed.data;
  }

  /** Date fields hold epoch milliseconds and are filtered by range; they get no inverted index. */
  protected sanitizeScalarIndexFields(fields: ScalarFieldSpec[]): ScalarFieldSpec[] {
    return fields.filter(f => f.type !== 'date_time');
  }

  protected normalizeRecordForRead(record: StoredRecord): StoredRecord {
    const fields: Fields = {};
    for (const [key, value] of Object.entries(record.fields)) {
      if (!HIDDEN_KEYS.has(key)) fields[key] = value;
    }
    return { ...record, fields };
  }

  protected async describeRemote(signal?: AbortSignal): Promise<RemoteCollectionInfo | null> {
    const has = HasSchema.safeParse(await this.call('collections/has', {}, signal));
    if (!has.success || !has.data.has) return null;

    const described = DescribeSchema.safeParse(await this.call('collections/describe', {}, signal));
    if (!described.success) throw new BackendError(this.backend, 'Unexpected collections/describe response');
    const { fields, indexes } = described.data;

    const vector = fields.find(f => f.name === VECTOR_FIELD);
    const dim = Number(vector?.params?.find(p => p.key === 'dim')?.value);
    if (!vector || !Number.isFinite(dim)) {
      throw new BackendError(this.backend, `Collection ${this.collectionName} has no "${VECTOR_FIELD}" field`);
    }
    this.columnDefaults = new Map(
      fields
        .filter(f => !HIDDEN_KEYS.has(f.name) && f.type in TYPE_DEFAULTS)
        .map(f => [f.name, TYPE_DEFAULTS[f.type] ?? null]),
    );
    return {
      name: this.collectionName,
      dimension: dim,
      distance: metricOf(indexes?.find(i => i.fieldName === VECTOR_FIELD)?.metricType),
      sparse: fields.some(f => f.name === SPARSE_FIELD),
    };
  }

  protected async createRemote(schema: CollectionSchema, indexMeta: IndexMeta): Promise<void> {
    const fields: Record<string, unknown>[] = [
      { fieldName: PRIMARY_FIELD, dataType: 'VarChar', isPrimary: true, elementTypeParams: { max_length: 64 } },
      { fieldName: VECTOR_FIELD, dataType: 'FloatVector', elementTypeParams: { dim: schema.dimension } },
    ];
    if (indexMeta.enableSparse) fields.push({ fieldName: SPARSE_FIELD, dataType: 'SparseFloatVector' });
    for (const f of schema.fields) {
      fields.push({
        fieldName: f.name,
        dataType: DATA_TYPES[f.type],
        ...(f.type === 'string' ? { elementTypeParams: { max_length: f.maxLength ?? 1024 } } : {}),
      });
    }

    const indexParams: Record<string, unknown>[] = [
      {
        fieldName: VECTOR_FIELD,
        indexName: indexMeta.indexName,
        metricType: METRIC_NAMES[indexMeta.distance],
        indexType: 'FLAT',
      },
    ];
    if (indexMeta.enableSparse) {
      indexParams.push({
        fieldName: SPARSE_FIELD,
        indexName: `${indexMeta.indexName}_sparse`,
        metricType: 'IP',
        indexType: 'SPARSE_INVERTED_INDEX',
      });
    }
    for (const name of indexMeta.scalarIndexFields) {
      indexParams.push({ fieldName: name, indexName: `idx_${name}`, indexType: 'INVERTED' });
    }

    await this.call('collections/create', {
      schema: { autoId: false, enableDynamicField: true, fields },
      indexParams,
    });
    this.columnDefaults = new Map(schema.fields.map(f => [f.name, f.default ?? TYPE_DEFAULTS[DATA_TYPES[f.type]] ?? null]));
  }

  protected async dropRemote(): Promise<void> {
    await this.call('collections/drop', {});
  }

  protected async writeRecords(records: StoredRecord[], signal?: AbortSignal): Promise<void> {
    const data = records.map(r => {
      const row: Record<string, unknown> = { [PRIMARY_FIELD]: r.id, [VECTOR_FIELD]: r.vector ?? [] };
      for (const [name, fallback] of this.columnDefaults) {
        const value = r.fields[name];
        row[name] = value === undefined || value === null ? fallback : value;
      }
      for (const [key, value] of Object.entries(r.fields)) {
        if (!this.columnDefaults.has(key)) row[key] = value;
      }
      if (r.sparseVector) {
        const { indices, values } = projectSparse(r.sparseVector);
        row[SPARSE_FIELD] = Object.fromEntries(indices.map((index, i) => [String(index), values[i] ?? 0]));
      }
      return row;
    });
    await this.call('entities/upsert', { data }, signal);
  }

  protected async fetchRecords(ids: string[]): Promise<StoredRecord[]> {
    const rows = await this.rows('entities/get', { id: ids, outputFields: ['*'] });
    return rows.map(row => {
      const vector = row[VECTOR_FIELD];
      return {
        id: rowId(row),
        vector: Array.isArray(vector) ? vector.filter((v): v is number => typeof v === 'number') : undefined,
        fields: scalarFields(row),
      };
    });
  }

  protected async removeRecords(ids: string[], signal?: AbortSignal): Promise<void> {
    await this.call('entities/delete', { filter: `${PRIMARY_FIELD} in [${ids.map(id => JSON.stringify(id)).join(', ')}]` }, signal);
  }

  protected async removeByFilter(filter: string | undefined): Promise<void> {
    // Milvus rejects an empty delete expression
    await this.call('entities/delete', { filter: filter ?? `${PRIMARY_FIELD} != ""` });
  }

  protected async countNative(filter: string | undefined): Promise<number> {
    const [row] = await this.rows('entities/query', { filter: filter ?? '', outputFields: ['count(*)'] });
    const count = row?.['count(*)'];
    return typeof count === 'number' ? count : Number(count ?? 0);
  }

  protected async searchNative(query: NativeQuery<string>): Promise<QueryHit[]> {
    const limit = Math.min(query.topK, QUERY_WINDOW);
    if (!query.vector && !query.sparseVector) {
      const rows = await this.rows('entities/query', { filter: query.filter ?? '', limit, outputFields: ['*'] }, query.signal);
      return rows.map(row => ({ id: rowId(row), score: 0, fields: scalarFields(row) }));
    }

    const sparse = query.sparseVector ? projectSparse(query.sparseVector) : undefined;
    const rows = await this.rows(
      'entities/search',
      {
        data: [sparse ? Object.fromEntries(sparse.indices.map((index, i) => [String(index), sparse.values[i] ?? 0])) : query.vector],
        annsField: sparse ? SPARSE_FIELD : VECTOR_FIELD,
        limit,
        outputFields: ['*'],
        ...(query.filter ? { filter: query.filter } : {}),
      },
      query.signal,
    );
    // L2 distances come back squared
    const euclid = !sparse && this.options.distance === 'l2';
    return rows.map(row => {
      const distance = Number(row['distance'] ?? 0);
      return {
        id: rowId(row),
        score: euclid ? distanceToScore(Math.sqrt(distance)) : distance,
        fields: scalarFields(row),
      };
    });
  }

  protected async aggregateNative(field: string, filter: string | undefined, limit: number): Promise<AggregateGroup[]> {
    const rows = await this.rows('entities/query', { filter: filter ?? '', limit: QUERY_WINDOW, outputFields: [field] });
    const counts = new Map<FieldValue, number>();
    for (const row of rows) {
      const value = scalarFields(row)[field];
      if (value === undefined) continue;
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    if (rows.length >= QUERY_WINDOW) {
      // a full window undercounts: recount each value it saw with count(*)
      this.log.warn(
        { field, window: QUERY_WINDOW, values: counts.size },
        'Aggregate scan hit the query window; values outside it are not listed',
      );
      for (const value of counts.keys()) {
        if (value === null) continue;
        const clause = `${field} == ${milvusLiteral(value)}`;
        counts.set(value, await this.countNative(filter ? `(${filter}) and ${clause}` : clause));
      }
    }
    return [...counts.entries()]
      .map(([value, count]) => ({ value, count }))
      .sort((x, y) => y.count - x.count || String(x.value).localeCompare(String(y.value)))
      .slice(0, Math.max(limit, 0));
  }
}
