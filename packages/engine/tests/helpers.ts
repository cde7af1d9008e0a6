/**
 * Deterministic in-process providers for tests.
 */
import { vi } from 'vitest';
import type { EmbeddingProvider } from '../src/embedding/interface.js';
import type { LLMProvider, LLMCompletionOpts } from '../src/llm/interface.js';
import type { Reranker, RerankScore } from '../src/search/reranker.js';
import { fnv1a32 } from '../src/vector/math.js';

export const DIM = 8;

export function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/** Hashed bag of words, L2-normalised. Texts sharing words land close together. */
export function bagOfWords(text: string, dims = DIM): number[] {
  const v = new Array<number>(dims).fill(0);
  for (const w of words(text)) {
    const i = fnv1a32(w) % dims;
    v[i] = (v[i] ?? 0) + 1;
  }
  const norm = Math.sqrt(v.reduce((s, x) => s + x * x, 0));
  return norm === 0 ? v.map((_, i) => (i === 0 ? 1 : 0)) : v.map(x => x / norm);
}

export function createMockEmbedding(dims = DIM): EmbeddingProvider {
  return {
    name: 'mock-embed',
    dimensions: dims,
    embed: async text => bagOfWords(text, dims),
    embedBatch: async texts => texts.map(t => bagOfWords(t, dims)),
  };
}

/** Answers every summarize prompt with a JSON summary built from the title line. */
export function createMockLLM(opts: { supportsImages?: boolean; reply?: (prompt: string, o?: LLMCompletionOpts) => string } = {}): LLMProvider {
  return {
    name: 'mock-llm',
    supportsImages: opts.supportsImages ?? false,
    complete: async (prompt, o) =>
      opts.reply ? opts.reply(prompt, o) : JSON.stringify({ abstract: 'Mock abstract.', overview: 'Mock overview.' }),
  };
}

/** Scores documents by how many query words they contain; omits documents with none. */
export function createWordOverlapReranker(): Reranker {
  return {
    name: 'overlap',
    rerank: async (query, documents): Promise<RerankScore[]> => {
      const q = new Set(words(query));
      return documents
        .map((d, index) => ({ index, score: words(d).filter(w => q.has(w)).length }))
        .filter(s => s.score > 0);
    },
  };
}

export function deferred<T>(): { promise: Promise<T>; resolve: (v: T) => void; reject: (e: unknown) => void } {
  let resolve: (v: T) => void = () => undefined;
  let reject: (e: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

export interface FetchCall {
  method: string;
  url: string;
  body: unknown;
  headers: Record<string, string>;
}

/** Replace global fetch with `handler`; returns the list of calls it received. */
export function stubFetch(handler: (call: FetchCall) => Response | Promise<Response>): FetchCall[] {
  const calls: FetchCall[] = [];
  vi.stubGlobal('fetch', vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const call: FetchCall = {
      method: init?.method ?? 'GET',
      url: String(input),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
      headers: Object.fromEntries(new Headers(init?.headers)),
    };
    calls.push(call);
    return handler(call);
  }));
  return calls;
}
