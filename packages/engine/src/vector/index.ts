export { CollectionAdapter, type AdapterState, type NativeQuery, type VectorCollection } from './adapter.js';
export { compileFilter, foldFilter, type CompiledFilter, type FilterVisitor } from './compiler.js';
export { Eq, In, Range, Contains, TimeRange, And, Or, Not, type FilterExpr, type FilterOp, type ScalarValue, type RangeBounds } from './expr.js';
export { memoryFilterVisitor, type FieldPredicate } from './filters/memory.js';
export { sqliteFilterVisitor, type SqlFragment } from './filters/sqlite.js';
export { qdrantFilterVisitor, toQdrantFilter, type QdrantCondition, type QdrantFilter } from './filters/qdrant.js';
export { milvusFilterVisitor } from './filters/milvus.js';
export { MemoryCollectionAdapter, MemoryVectorStore } from './memory.js';
export { SqliteCollectionAdapter, openSqliteDatabase } from './sqlite.js';
export { QdrantCollectionAdapter, type QdrantAdapterOptions } from './qdrant.js';
export { MilvusCollectionAdapter, type MilvusAdapterOptions } from './milvus.js';
export { BackendRegistry, createBackendRegistry, adapterOptions, type BackendFactory, type BackendRegistryOptions } from './registry.js';
export { CONTEXT_FIELDS, contextCollectionSchema, type CollectionSchema, type ScalarFieldSpec, type ScalarType } from './schema.js';
export { cosineSimilarity, similarity, sparseDot, projectSparse, fnv1a32 } from './math.js';
export type * from './types.js';
