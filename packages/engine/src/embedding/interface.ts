export interface EmbedCallOptions {
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  readonly name: string;
  /** Model identifier; part of the gateway signature. */
  readonly model?: string;
  readonly dimensions: number;
  embed(text: string, opts?: EmbedCallOptions): Promise<number[]>;
  embedBatch(texts: string[], opts?: EmbedCallOptions): Promise<number[][]>;
}

/** Term → weight mapping. Terms are backend-neutral strings. */
export type SparseVector = Record<string, number>;

export interface SparseEmbeddingProvider {
  readonly name: string;
  embedSparse(texts: string[], opts?: EmbedCallOptions): Promise<SparseVector[]>;
}
