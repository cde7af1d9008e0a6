import { describe, it, expect } from 'vitest';
import { ContextBuilder, type ContextBuilderSettings } from '../src/context/builder.js';
import { chunkText } from '../src/context/chunker.js';
import { ModelGateway, type GatewayProviders } from '../src/gateway/model-gateway.js';
import { InMemoryByteStore } from '../src/storage/byte-store.js';
import { contentHash, estimateTokens } from '../src/utils/helpers.js';
import { ValidationError } from '../src/errors.js';
import type { LLMCompletionOpts } from '../src/llm/interface.js';
import { DIM, createMockEmbedding, createMockLLM } from './helpers.js';

const builderSettings: ContextBuilderSettings = {
  abstractTokens: 100,
  overviewTokens: 2000,
  chunkTokens: 6000,
  contentEmbedTokens: 2000,
};

function gatewayWith(providers: GatewayProviders): ModelGateway {
  return new ModelGateway(
    {
      concurrency: { embedding: 2, vlm: 2, rerank: 1 },
      retries: 0,
      backoffBaseMs: 0,
      backoffMaxMs: 0,
      dimension: DIM,
      abstractTokens: 100,
      overviewTokens: 2000,
      vlmMaxTokens: 500,
    },
    providers,
  );
}

const alpha = 'alpha '.repeat(20).trim();
const bravo = 'bravo '.repeat(20).trim();
const twoSections = `# Intro\n\n${alpha}\n\n# Details\n\n${bravo}`;

describe('chunkText', () => {
  it('keeps short text in one untitled chunk', () => {
    expect(chunkText('One paragraph.\n\nAnother one.', 100)).toEqual([
      { index: 0, title: undefined, text: 'One paragraph.\n\nAnother one.' },
    ]);
  });

  it('starts a new chunk at a heading once the current chunk is half full', () => {
    expect(chunkText(twoSections, 40)).toEqual([
      { index: 0, title: 'Intro', text: `# Intro\n\n${alpha}` },
      { index: 1, title: 'Details', text: `# Details\n\n${bravo}` },
    ]);
  });

  it('splits an oversized paragraph on sentence boundaries', () => {
    const paragraph = Array.from({ length: 30 }, () => 'The quick fox jumps.').join(' ');
    const chunks = chunkText(paragraph, 40);
    expect(chunks).toHaveLength(5);
    expect(chunks.every(c => estimateTokens(c.text) <= 40)).toBe(true);
    expect(chunks.map(c => c.text).join(' ')).toBe(paragraph);
  });
});

describe('ContextBuilder.load', () => {
  it('resolves inline text and derives the title from the uri', async () => {
    const builder = new ContextBuilder(gatewayWith({}), builderSettings);
    const loaded = await builder.load({ uri: 'mem://docs/Release%20Notes.md', contentType: 'text', text: 'Shipped.' });
    expect(loaded).toMatchObject({
      title: 'Release Notes.md',
      mimeType: 'text/plain',
      text: 'Shipped.',
      byteLength: 8,
      hash: contentHash('Shipped.'),
      inline: true,
    });
  });

  it('fetches text from the byte store when none is inline', async () => {
    const bytes = new InMemoryByteStore();
    await bytes.putBytes('mem://doc.txt', new TextEncoder().encode('Stored text.'));
    const builder = new ContextBuilder(gatewayWith({}), builderSettings, bytes);

    const loaded = await builder.load({ uri: 'mem://doc.txt', contentType: 'text' });
    expect(loaded).toMatchObject({ text: 'Stored text.', inline: false, byteLength: 12, hash: contentHash('Stored text.') });
  });

  it('hashes attached images into mixed content', async () => {
    const builder = new ContextBuilder(gatewayWith({}), builderSettings);
    const plain = await builder.load({ uri: 'mem://a', contentType: 'text', text: 'Caption.' });
    const mixed = await builder.load({
      uri: 'mem://a',
      contentType: 'mixed',
      text: 'Caption.',
      images: [{ data: 'AQID', mimeType: 'image/png' }],
    });
    expect(mixed.images).toHaveLength(1);
    expect(mixed.hash).not.toBe(plain.hash);
  });

  it('rejects resources without content', async () => {
    const builder = new ContextBuilder(gatewayWith({}), builderSettings);
    await expect(builder.load({ uri: ' ', contentType: 'text', text: 'x' })).rejects.toThrow(ValidationError);
    await expect(builder.load({ uri: 'mem://a', contentType: 'text', text: '  \n ' })).rejects.toThrow(ValidationError);
    await expect(builder.load({ uri: 'mem://a', contentType: 'text' })).rejects.toThrow('no byte store is configured');
    await expect(builder.load({ uri: 'mem://a.png', contentType: 'image', bytes: new Uint8Array() })).rejects.toThrow(
      ValidationError,
    );
  });
});

describe('ContextBuilder.build', () => {
  it('summarizes a short document in one call', async () => {
    const prompts: string[] = [];
    const vlm = createMockLLM({
      reply: prompt => {
        prompts.push(prompt);
        return '{"abstract": "Cats nap.", "overview": "# Cats\\n- nap"}';
      },
    });
    const builder = new ContextBuilder(gatewayWith({ dense: createMockEmbedding(), vlm }), builderSettings);
    const loaded = await builder.load({ uri: 'mem://cats.md', contentType: 'text', text: 'Cats nap a lot.' });

    expect(await builder.build(loaded)).toEqual({
      abstract: 'Cats nap.',
      overview: '# Cats\n- nap',
      contentExcerpt: 'Cats nap a lot.',
      chunks: 1,
      degraded: false,
    });
    expect(prompts).toEqual(['Resource: cats.md\n\nDescribe the following resource.\n\n<content>\nCats nap a lot.\n</content>']);
  });

  it('falls back to extractive layers without a model', async () => {
    const builder = new ContextBuilder(gatewayWith({}), builderSettings);
    const loaded = await builder.load({ uri: 'mem://cats.md', contentType: 'text', text: 'Cats sleep a lot. They also purr.' });
    expect(await builder.build(loaded)).toEqual({
      abstract: 'Cats sleep a lot. They also purr.',
      overview: 'Cats sleep a lot. They also purr.',
      contentExcerpt: 'Cats sleep a lot. They also purr.',
      chunks: 1,
      degraded: true,
    });
  });

  it('merges chunk summaries and anchors one overview section per chunk', async () => {
    const vlm = createMockLLM({
      reply: prompt => {
        if (prompt.includes('alpha')) return '{"abstract": "First part.", "overview": "First overview."}';
        if (prompt.includes('bravo')) return '{"abstract": "Second part.", "overview": "Second overview."}';
        return '{"abstract": "Whole doc.", "overview": "Lead paragraph.\\n\\nMore detail."}';
      },
    });
    const builder = new ContextBuilder(gatewayWith({ vlm }), { ...builderSettings, chunkTokens: 40 });
    const loaded = await builder.load({ uri: 'mem://notes.md', contentType: 'text', text: twoSections });

    expect(await builder.build(loaded)).toEqual({
      abstract: 'Whole doc.',
      overview: 'Lead paragraph.\n\n## [1/2] Intro\nFirst overview.\n\n## [2/2] Details\nSecond overview.',
      contentExcerpt: twoSections,
      chunks: 2,
      degraded: false,
    });
  });

  it('describes images through a vision model', async () => {
    const seen: (LLMCompletionOpts | undefined)[] = [];
    const vlm = createMockLLM({
      supportsImages: true,
      reply: (_, o) => {
        seen.push(o);
        return '{"abstract": "A red square.", "overview": "Red square on white."}';
      },
    });
    const builder = new ContextBuilder(gatewayWith({ vlm }), builderSettings);
    const loaded = await builder.load({
      uri: 'mem://pics/square.png',
      contentType: 'image',
      bytes: new Uint8Array([1, 2, 3]),
      mimeType: 'image/png',
    });

    expect(loaded.images).toEqual([{ data: 'AQID', mimeType: 'image/png' }]);
    expect(await builder.build(loaded)).toEqual({
      abstract: 'A red square.',
      overview: 'Red square on white.',
      contentExcerpt: '',
      chunks: 1,
      degraded: false,
    });
    expect(seen[0]?.images).toEqual([{ data: 'AQID', mimeType: 'image/png' }]);
  });

  it('describes images from metadata when no model can see them', async () => {
    const builder = new ContextBuilder(gatewayWith({ vlm: createMockLLM() }), builderSettings);
    const loaded = await builder.load({
      uri: 'mem://pics/cat.png',
      contentType: 'image',
      bytes: new Uint8Array([1, 2, 3]),
      mimeType: 'image/png',
    });

    expect(await builder.build(loaded)).toEqual({
      abstract: 'Image "cat.png" (image/png, 3 bytes).',
      overview: '# cat.png\n- Type: image\n- Format: image/png\n- Size: 3 bytes\n- Source: mem://pics/cat.png',
      contentExcerpt: '',
      chunks: 1,
      degraded: true,
    });
  });
});
