import { z } from 'zod';
import { BackendError } from '../errors.js';
import type { SparseVector } from '../embedding/interface.js';
import type { FilterVisitor } from './compiler.js';
import { CollectionAdapter, type NativeQuery } from './adapter.js';
import { qdrantFilterVisitor, toQdrantFilter, type QdrantCondition, type QdrantFilter } from './filters/qdrant.js';
import { HttpJsonClient } from './http.js';
import { distanceToScore, projectSparse } from './math.js';
import type { CollectionSchema, ScalarType } from './schema.js';
import type {
  AdapterOptions,
  AggregateGroup,
  DistanceMetric,
  Fields,
  IndexMeta,
  QueryHit,
  RemoteCollectionInfo,
  StoredRecord,
} from './types.js';

const DENSE = 'dense';
const SPARSE = 'sparse';
const SCROLL_PAGE = 256;

const DISTANCE_NAMES: Record<DistanceMetric, string> = { cosine: 'Cosine', dot: 'Dot', l2: 'Euclid' };

const FIELD_SCHEMA: Record<ScalarType, string> = {
  string: 'keyword',
  int64: 'integer',
  float: 'float',
  bool: 'bool',
  // epoch milliseconds, not RFC 3339 strings
  date_time: 'integer',
};

const PointIdSchema = z.union([z.string(), z.number()]).transform(String);
const PayloadSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).nullish();

const VectorParamsSchema = z.object({ size: z.number(), distance: z.string() });

const CollectionInfoSchema = z.object({
  result: z.object({
    points_count: z.number().nullish(),
    config: z.object({
      params: z.object({
        // an unnamed default vector is read as if it were named "dense"
        vectors: z.union([VectorParamsSchema.transform(v => ({ [DENSE]: v })), z.record(VectorParamsSchema)]),
        sparse_vectors: z.record(z.unknown()).nullish(),
      }),
    }),
  }),
});

const PointSchema = z.object({
  id: PointIdSchema,
  payload: PayloadSchema,
  vector: z.union([z.array(z.number()), z.record(z.unknown())]).nullish(),
});

const ScoredPointSchema = z.object({ id: PointIdSchema, score: z.number(), payload: PayloadSchema });

const QueryResponseSchema = z.object({ result: z.object({ points: z.array(ScoredPointSchema) }) });
const RetrieveResponseSchema = z.object({ result: z.array(PointSchema) });
const ScrollResponseSchema = z.object({
  result: z.object({ points: z.array(PointSchema), next_page_offset: z.union([z.string(), z.number()]).nullish() }),
});
const CountResponseSchema = z.object({ result: z.object({ count: z.number() }) });
const FacetResponseSchema = z.object({
  result: z.object({ hits: z.array(z.object({ value: z.union([z.string(), z.number(), z.boolean()]), count: z.number() })) }),
});

function toDistance(name: string): DistanceMetric {
  switch (name.toLowerCase()) {
    case 'dot':
      return 'dot';
    case 'euclid':
      return 'l2';
    default:
      return 'cosine';
  }
}

function denseOf(vector: z.infer<typeof PointSchema>['vector']): number[] | undefined {
  if (!vector) return undefined;
  if (Array.isArray(vector)) return vector;
  const dense = vector[DENSE];
  return Array.isArray(dense) ? dense.filter((v): v is number => typeof v === 'number') : undefined;
}

export interface QdrantAdapterOptions extends AdapterOptions {
  url: string;
  apiKey?: string;
}

/**
 * Qdrant over its REST API. Dense and sparse vectors are named vectors of one point;
 * sparse term maps are projected onto uint32 indices.
 */
export class QdrantCollectionAdapter extends CollectionAdapter<QdrantCondition> {
  readonly backend = 'qdrant';
  protected readonly filterVisitor: FilterVisitor<QdrantCondition> = qdrantFilterVisitor;
  private readonly http: HttpJsonClient;
  private readonly base: string;

  constructor(options: QdrantAdapterOptions) {
    super(options);
    this.http = new HttpJsonClient({
      backend: this.backend,
      baseUrl: options.url,
      headers: options.apiKey ? { 'api-key': options.apiKey } : {},
      timeoutMs: options.timeoutMs,
      retries: options.retries,
    });
    this.base = `/collections/${encodeURIComponent(options.collection)}`;
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new BackendError(this.backend, `Unexpected ${what} response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  private filterBody(filter: QdrantCondition | undefined): { filter?: QdrantFilter } {
    return filter ? { filter: toQdrantFilter(filter) } : {};
  }

  protected async describeRemote(signal?: AbortSignal): Promise<RemoteCollectionInfo | null> {
    const res = await this.http.request(this.base, { method: 'GET', signal, allowStatus: [404] });
    if (res.status === 404) return null;
    const { result } = this.parse(CollectionInfoSchema, res.data, 'collection info');
    const dense = result.config.params.vectors[DENSE];
    if (!dense) {
      throw new BackendError(this.backend, `Collection ${this.collectionName} has no "${DENSE}" vector`);
    }
    return {
      name: this.collectionName,
      dimension: dense.size,
      distance: toDistance(dense.distance),
      sparse: Boolean(result.config.params.sparse_vectors?.[SPARSE]),
      count: result.points_count ?? undefined,
    };
  }

  protected async createRemote(schema: CollectionSchema, indexMeta: IndexMeta): Promise<void> {
    const res = await this.http.request(this.base, {
      method: 'PUT',
      body: {
        vectors: { [DENSE]: { size: schema.dimension, distance: DISTANCE_NAMES[schema.distance] } },
        ...(indexMeta.enableSparse ? { sparse_vectors: { [SPARSE]: {} } } : {}),
      },
      allowStatus: [409],
    });
    if (res.status === 409) {
      this.log.info('Collection created concurrently by another client');
      return;
    }

    const types = new Map(schema.fields.map(f => [f.name, f.type]));
    for (const field of indexMeta.scalarIndexFields) {
      await this.http.request(`${this.base}/index?wait=true`, {
        method: 'PUT',
        body: { field_name: field, field_schema: FIELD_SCHEMA[types.get(field) ?? 'string'] },
      });
    }
  }

  protected async dropRemote(): Promise<void> {
    await this.http.request(this.base, { method: 'DELETE', allowStatus: [404] });
  }

  protected async writeRecords(records: StoredRecord[], signal?: AbortSignal): Promise<void> {
    await this.http.request(`${this.base}/points?wait=true`, {
      method: 'PUT',
      signal,
      body: {
        points: records.map(r => ({
          id: r.id,
          vector: {
            [DENSE]: r.vector ?? [],
            ...(r.sparseVector ? { [SPARSE]: projectSparse(r.sparseVector) } : {}),
          },
          payload: r.fields,
        })),
      },
    });
  }

  protected async fetchRecords(ids: string[]): Promise<StoredRecord[]> {
    const res = await this.http.request(`${this.base}/points`, {
      body: { ids, with_payload: true, with_vector: [DENSE] },
    });
    return this.parse(RetrieveResponseSchema, res.data, 'retrieve').result.map(p => ({
      id: p.id,
      vector: denseOf(p.vector),
      fields: { ...(p.payload ?? {}) },
    }));
  }

  protected async removeRecords(ids: string[], signal?: AbortSignal): Promise<void> {
    await this.http.request(`${this.base}/points/delete?wait=true`, { signal, body: { points: ids } });
  }

  protected async removeByFilter(filter: QdrantCondition | undefined): Promise<void> {
    await this.http.request(`${this.base}/points/delete?wait=true`, {
      body: { filter: filter ? toQdrantFilter(filter) : {} },
    });
  }

  protected async countNative(filter: QdrantCondition | undefined): Promise<number> {
    const res = await this.http.request(`${this.base}/points/count`, {
      body: { exact: true, ...this.filterBody(filter) },
    });
    return this.parse(CountResponseSchema, res.data, 'count').result.count;
  }

  protected async searchNative(query: NativeQuery<QdrantCondition>): Promise<QueryHit[]> {
    if (!query.vector && !query.sparseVector) return this.scroll(query.filter, query.topK, query.signal);

    const sparse: SparseVector | undefined = query.sparseVector;
    const res = await this.http.request(`${this.base}/points/query`, {
      signal: query.signal,
      body: {
        query: sparse ? projectSparse(sparse) : query.vector,
        using: sparse ? SPARSE : DENSE,
        limit: query.topK,
        with_payload: true,
        ...this.filterBody(query.filter),
      },
    });
    const euclid = !sparse && this.options.distance === 'l2';
    return this.parse(QueryResponseSchema, res.data, 'query').result.points.map(p => ({
      id: p.id,
      score: euclid ? distanceToScore(p.score) : p.score,
      fields: { ...(p.payload ?? {}) },
    }));
  }

  private async scroll(filter: QdrantCondition | undefined, topK: number, signal?: AbortSignal): Promise<QueryHit[]> {
    const hits: QueryHit[] = [];
    let offset: string | number | undefined;
    do {
      const res = await this.http.request(`${this.base}/points/scroll`, {
        signal,
        body: {
          limit: Math.min(SCROLL_PAGE, topK - hits.length),
          with_payload: true,
          with_vector: false,
          ...(offset !== undefined ? { offset } : {}),
          ...this.filterBody(filter),
        },
      });
      const page = this.parse(ScrollResponseSchema, res.data, 'scroll').result;
      for (const p of page.points) {
        const fields: Fields = { ...(p.payload ?? {}) };
        hits.push({ id: p.id, score: 0, fields });
      }
      offset = page.next_page_offset ?? undefined;
    } while (offset !== undefined && hits.length < topK);
    return hits;
  }

  protected async aggregateNative(field: string, filter: QdrantCondition | undefined, limit: number): Promise<AggregateGroup[]> {
    const res = await this.http.request(`${this.base}/facet`, {
      body: { key: field, limit, exact: true, ...this.filterBody(filter) },
    });
    return this.parse(FacetResponseSchema, res.data, 'facet').result.hits.map(h => ({ value: h.value, count: h.count }));
  }
}
