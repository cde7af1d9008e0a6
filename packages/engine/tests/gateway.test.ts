import { describe, it, expect, vi } from 'vitest';
import { ModelGateway, type GatewayProviders, type GatewaySettings } from '../src/gateway/model-gateway.js';
import { ConfigError, DimensionMismatchError, ModelUnavailableError } from '../src/errors.js';
import type { EmbeddingProvider } from '../src/embedding/interface.js';
import { ProviderError } from '../src/utils/retry.js';
import { LexicalSparseEmbedder } from '../src/embedding/lexical.js';
import { bagOfWords, createMockEmbedding, createMockLLM, deferred, DIM } from './helpers.js';

const settings: GatewaySettings = {
  concurrency: { embedding: 2, vlm: 2, rerank: 1 },
  retries: 2,
  backoffBaseMs: 0,
  backoffMaxMs: 0,
  dimension: DIM,
  abstractTokens: 100,
  overviewTokens: 2000,
  vlmMaxTokens: 500,
};

function gateway(providers: GatewayProviders, overrides: Partial<GatewaySettings> = {}): ModelGateway {
  return new ModelGateway({ ...settings, ...overrides }, providers);
}

describe('ModelGateway.embed', () => {
  it('runs at most the configured number of embedding calls at once and queues the rest', async () => {
    const release = deferred<void>();
    let active = 0;
    let peak = 0;
    const dense: EmbeddingProvider = {
      name: 'slow',
      dimensions: DIM,
      embed: async t => bagOfWords(t),
      embedBatch: async texts => {
        active++;
        peak = Math.max(peak, active);
        await release.promise;
        active--;
        return texts.map(t => bagOfWords(t));
      },
    };
    const gw = gateway({ dense });

    const calls = Array.from({ length: 5 }, (_, i) => gw.embed([`text ${i}`], 'dense'));
    await new Promise(r => setTimeout(r, 5));
    expect(gw.stats().embedding).toEqual({ limit: 2, inFlight: 2, queued: 3 });

    release.resolve();
    const results = await Promise.all(calls);
    expect(results).toHaveLength(5);
    expect(peak).toBe(2);
    expect(gw.stats().embedding.inFlight).toBe(0);
  });

  it('retries transient provider failures', async () => {
    const dense = createMockEmbedding();
    const spy = vi
      .spyOn(dense, 'embedBatch')
      .mockRejectedValueOnce(new ProviderError('busy', 503))
      .mockRejectedValueOnce(new ProviderError('throttled', 429));

    const [v] = await gateway({ dense }).embed(['hello'], 'dense');
    expect(v).toEqual(bagOfWords('hello'));
    expect(spy).toHaveBeenCalledTimes(3);
  });

  it('surfaces ModelUnavailable once the retry budget is spent', async () => {
    const dense = createMockEmbedding();
    const spy = vi.spyOn(dense, 'embedBatch').mockRejectedValue(new ProviderError('down', 503));

    const err = await gateway({ dense }).embed(['x'], 'dense').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ModelUnavailableError);
    expect(err).toMatchObject({ code: 'MODEL_UNAVAILABLE', capability: 'embedding', attempts: 3 });
    expect(spy).toHaveBeenCalledTimes(3);
  });

  it('does not retry a client error', async () => {
    const dense = createMockEmbedding();
    const spy = vi.spyOn(dense, 'embedBatch').mockRejectedValue(new ProviderError('bad request', 400));

    await expect(gateway({ dense }).embed(['x'], 'dense')).rejects.toMatchObject({ attempts: 1 });
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('rejects vectors whose dimension differs from the configured one', async () => {
    const dense = createMockEmbedding(3);
    await expect(gateway({ dense }).embed(['x'], 'dense')).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it('fails with ConfigError when the requested kind has no provider', async () => {
    await expect(gateway({}).embed(['x'], 'dense')).rejects.toBeInstanceOf(ConfigError);
    await expect(gateway({}).embed(['x'], 'sparse')).rejects.toBeInstanceOf(ConfigError);
  });

  it('returns sparse term weights from the sparse provider', async () => {
    const [v] = await gateway({ sparse: new LexicalSparseEmbedder() }).embed(['the cat sat'], 'sparse');
    expect(Object.keys(v ?? {})).toEqual(['cat', 'sat']);
    expect(v?.['cat']).toBeCloseTo(Math.SQRT1_2);
  });

  it('times out a caller that waits too long for a slot', async () => {
    const release = deferred<void>();
    const dense: EmbeddingProvider = {
      ...createMockEmbedding(),
      embedBatch: async texts => {
        await release.promise;
        return texts.map(t => bagOfWords(t));
      },
    };
    const gw = gateway({ dense }, { concurrency: { embedding: 1, vlm: 1, rerank: 1 } });
    const first = gw.embed(['a'], 'dense');

    await expect(gw.embed(['b'], 'dense', { timeoutMs: 10 })).rejects.toMatchObject({ code: 'TIMEOUT' });
    release.resolve();
    await first;
  });
});

describe('ModelGateway.summarize', () => {
  it('degrades to the extractive outline without a VLM', async () => {
    const summary = await gateway({}).summarize({ text: 'First sentence here. Second one.' });
    expect(summary).toEqual({
      abstract: 'First sentence here. Second one.',
      overview: 'First sentence here. Second one.',
      degraded: true,
    });
  });

  it('builds the outline from headings', async () => {
    const text = '# Setup\n\nInstall the tool. Then run it.\n\n## Usage\n\nCall the API.';
    const summary = await gateway({}).summarize({ text });
    expect(summary.overview).toBe('# Setup\nInstall the tool.\n## Usage\nCall the API.');
    expect(summary.abstract).toBe('Install the tool. Then run it. Call the API.');
  });

  it('parses the JSON answer of the model', async () => {
    const vlm = createMockLLM({ reply: () => '```json\n{"abstract": "Short.", "overview": "Longer view."}\n```' });
    expect(await gateway({ vlm }).summarize({ text: 'anything' })).toEqual({
      abstract: 'Short.',
      overview: 'Longer view.',
      degraded: false,
    });
  });

  it('keeps a free-form answer as the overview', async () => {
    const vlm = createMockLLM({ reply: () => 'Plain answer. With two sentences.' });
    expect(await gateway({ vlm }).summarize({ text: 'anything' })).toEqual({
      abstract: 'Plain answer. With two sentences.',
      overview: 'Plain answer. With two sentences.',
      degraded: false,
    });
  });

  it('forwards images only to a vision-capable model', async () => {
    const vlm = createMockLLM({ supportsImages: true });
    const complete = vi.spyOn(vlm, 'complete');
    const images = [{ data: 'AAAA', mimeType: 'image/png' }];

    await gateway({ vlm }).summarize({ images, title: 'chart' });
    expect(complete.mock.calls[0]?.[1]?.images).toEqual(images);
  });

  it('falls back to extractive text for images a text-only model cannot see', async () => {
    const vlm = createMockLLM({ supportsImages: false });
    const complete = vi.spyOn(vlm, 'complete');
    const summary = await gateway({ vlm }).summarize({ images: [{ data: 'AAAA', mimeType: 'image/png' }], title: 'Chart.' });
    expect(complete).not.toHaveBeenCalled();
    expect(summary).toEqual({ abstract: 'Chart.', overview: 'Chart.', degraded: true });
  });

  it('surfaces ModelUnavailable when the VLM keeps failing', async () => {
    const vlm = createMockLLM();
    vi.spyOn(vlm, 'complete').mockRejectedValue(new ProviderError('overloaded', 529));
    await expect(gateway({ vlm }).summarize({ text: 'x' })).rejects.toMatchObject({ capability: 'vlm' });
  });
});

describe('ModelGateway.rerank', () => {
  it('orders scores best first, ties by input position', async () => {
    const gw = gateway({
      rerank: {
        name: 'fixed',
        rerank: async () => [{ index: 2, score: 0.5 }, { index: 0, score: 0.9 }, { index: 1, score: 0.5 }],
      },
    });
    expect(await gw.rerank('q', ['a', 'b', 'c'])).toEqual([
      { index: 0, score: 0.9 },
      { index: 1, score: 0.5 },
      { index: 2, score: 0.5 },
    ]);
  });

  it('rejects an out-of-range index', async () => {
    const gw = gateway({ rerank: { name: 'bad', rerank: async () => [{ index: 7, score: 1 }] } });
    await expect(gw.rerank('q', ['a'])).rejects.toBeInstanceOf(ModelUnavailableError);
  });
});

describe('ModelGateway capabilities', () => {
  it('reports configured providers and a stable signature', () => {
    const gw = gateway({ dense: createMockEmbedding(), vlm: createMockLLM({ supportsImages: true }) });
    expect(gw.capabilities()).toEqual({ dense: true, sparse: false, vlm: true, vision: true, rerank: false });
    expect(gw.signature()).toBe(`mock-embed:${DIM}|none|mock-llm|100/2000`);
    expect(gateway({}).signature()).toBe('none|none|extractive|100/2000');
  });

  it('names the models and the sparse encoder in the signature', () => {
    const dense = { ...createMockEmbedding(), model: 'small-v1' };
    const vlm = { ...createMockLLM(), model: 'vision-v2' };
    expect(gateway({ dense, vlm, sparse: new LexicalSparseEmbedder() }).signature()).toBe(
      `mock-embed/small-v1:${DIM}|lexical|mock-llm/vision-v2|100/2000`,
    );
    expect(gateway({ dense: { ...dense, model: 'small-v2' }, vlm }).signature()).not.toBe(gateway({ dense, vlm }).signature());
  });
});
