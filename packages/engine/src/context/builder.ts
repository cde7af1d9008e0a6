import { ValidationError } from '../errors.js';
import type { GatewayCallOptions, ModelGateway, Summary } from '../gateway/model-gateway.js';
import type { ImageInput } from '../llm/interface.js';
import type { ByteStore } from '../storage/byte-store.js';
import { contentHash, estimateTokens, truncateToTokens } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { chunkText } from './chunker.js';

const log = createLogger('context');

export type ContentType = 'text' | 'image' | 'mixed';

export interface ResourceInput {
  uri: string;
  contentType: ContentType;
  /** Inline text. When absent the text is fetched from the byte store by uri. */
  text?: string;
  /** Inline image bytes for `image` resources. */
  bytes?: Uint8Array;
  mimeType?: string;
  title?: string;
  /** Images attached to a `mixed` resource. */
  images?: ImageInput[];
}

/** Resource content resolved to what the summarizer consumes. */
export interface LoadedContent {
  uri: string;
  contentType: ContentType;
  title: string;
  mimeType: string;
  text: string;
  images: ImageInput[];
  byteLength: number;
  hash: string;
  /** Content arrived inline rather than from the byte store. */
  inline: boolean;
}

export interface BuiltContext {
  /** L0 */
  abstract: string;
  /** L1 */
  overview: string;
  /** Text that represents L2 in the index; empty for images. */
  contentExcerpt: string;
  chunks: number;
  degraded: boolean;
}

export interface ContextBuilderSettings {
  abstractTokens: number;
  overviewTokens: number;
  chunkTokens: number;
  contentEmbedTokens: number;
}

function titleFromUri(uri: string): string {
  const last = uri.split(/[/\\]/).filter(Boolean).pop() ?? uri;
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

function defaultMime(contentType: ContentType): string {
  return contentType === 'image' ? 'application/octet-stream' : 'text/plain';
}

/**
 * Derives L0/L1 for a resource through the gateway. Long text is summarized chunk by
 * chunk; L0 then comes from a merge over the chunk abstracts and L1 keeps one anchored
 * section per chunk.
 */
export class ContextBuilder {
  constructor(
    private readonly gateway: ModelGateway,
    private readonly settings: ContextBuilderSettings,
    private readonly bytes?: ByteStore,
  ) {}

  /** Resolve inline or stored content and hash it. */
  async load(resource: ResourceInput, opts: GatewayCallOptions = {}): Promise<LoadedContent> {
    if (!resource.uri.trim()) throw new ValidationError('Resource uri must not be empty');
    const title = resource.title?.trim() || titleFromUri(resource.uri);
    const mimeType = resource.mimeType ?? defaultMime(resource.contentType);

    if (resource.contentType === 'image') {
      const inline = resource.bytes !== undefined;
      const bytes = resource.bytes ?? (await this.fetch(resource.uri, opts.signal));
      if (bytes.byteLength === 0) throw new ValidationError(`Image ${resource.uri} is empty`);
      return {
        uri: resource.uri,
        contentType: 'image',
        title,
        mimeType,
        text: '',
        images: [{ data: Buffer.from(bytes).toString('base64'), mimeType }],
        byteLength: bytes.byteLength,
        hash: contentHash(bytes),
        inline,
      };
    }

    const inline = resource.text !== undefined;
    const text = resource.text ?? new TextDecoder().decode(await this.fetch(resource.uri, opts.signal));
    const images = resource.contentType === 'mixed' ? (resource.images ?? []) : [];
    if (!text.trim() && images.length === 0) {
      throw new ValidationError(`Resource ${resource.uri} has no content`);
    }
    const hash = contentHash(images.length > 0 ? `${text}\u0000${images.map(i => i.data).join('\u0000')}` : text);
    return {
      uri: resource.uri,
      contentType: resource.contentType,
      title,
      mimeType,
      text,
      images,
      byteLength: Buffer.byteLength(text, 'utf8'),
      hash,
      inline,
    };
  }

  async build(content: LoadedContent, opts: GatewayCallOptions = {}): Promise<BuiltContext> {
    if (content.contentType === 'image') return this.buildImage(content, opts);

    const chunks = chunkText(content.text, this.settings.chunkTokens);
    const contentExcerpt = truncateToTokens(content.text, this.settings.contentEmbedTokens);

    if (chunks.length <= 1) {
      const summary = await this.gateway.summarize(
        { text: content.text, images: content.images, title: content.title, mode: 'document' },
        opts,
      );
      return this.finish(summary.abstract, summary.overview, contentExcerpt, 1, summary.degraded, content.title);
    }

    log.debug({ uri: content.uri, chunks: chunks.length }, 'Summarizing in chunks');
    const partials = await Promise.all(
      chunks.map((chunk, i) =>
        this.gateway.summarize(
          {
            text: chunk.text,
            images: i === 0 ? content.images : undefined,
            title: chunk.title ? `${content.title} / ${chunk.title}` : content.title,
            mode: 'chunk',
          },
          opts,
        ),
      ),
    );
    const n = chunks.length;
    const merged = await this.gateway.summarize(
      {
        text: partials.map((p, i) => `[${i + 1}/${n}] ${p.abstract}`).join('\n\n'),
        title: content.title,
        mode: 'merge',
      },
      opts,
    );

    const overview = this.anchoredOverview(merged, partials, chunks.map(c => c.title));
    const degraded = merged.degraded || partials.some(p => p.degraded);
    return this.finish(merged.abstract, overview, contentExcerpt, n, degraded, content.title);
  }

  /** Lead of the merged overview, then one `## [i/n] title` section per chunk. */
  private anchoredOverview(merged: Summary, partials: Summary[], titles: (string | undefined)[]): string {
    const n = partials.length;
    const lead = truncateToTokens(merged.overview.split(/\n\s*\n/)[0]?.trim() ?? '', Math.floor(this.settings.overviewTokens / 5));
    const headers = titles.map((t, i) => `## [${i + 1}/${n}] ${t ?? `Part ${i + 1}`}`);
    const fixed = estimateTokens(lead) + headers.reduce((sum, h) => sum + estimateTokens(h) + 1, 0);
    const perSection = Math.max(1, Math.floor((this.settings.overviewTokens - fixed) / n) - 1);
    const sections = partials.map((p, i) => `${headers[i] ?? ''}\n${truncateToTokens(p.overview.trim(), perSection)}`);
    return [lead, ...sections].filter(Boolean).join('\n\n');
  }

  private async buildImage(content: LoadedContent, opts: GatewayCallOptions): Promise<BuiltContext> {
    if (this.gateway.capabilities().vision) {
      const summary = await this.gateway.summarize({ images: content.images, title: content.title, mode: 'image' }, opts);
      return this.finish(summary.abstract, summary.overview, '', 1, summary.degraded, content.title);
    }
    const abstract = `Image "${content.title}" (${content.mimeType}, ${content.byteLength} bytes).`;
    const overview = [
      `# ${content.title}`,
      `- Type: image`,
      `- Format: ${content.mimeType}`,
      `- Size: ${content.byteLength} bytes`,
      `- Source: ${content.uri}`,
    ].join('\n');
    return this.finish(abstract, overview, '', 1, true, content.title);
  }

  private finish(
    abstract: string,
    overview: string,
    contentExcerpt: string,
    chunks: number,
    degraded: boolean,
    title: string,
  ): BuiltContext {
    const l0 = truncateToTokens(abstract.trim() || title, this.settings.abstractTokens);
    const l1 = truncateToTokens(overview.trim() || l0, this.settings.overviewTokens);
    return { abstract: l0, overview: l1, contentExcerpt, chunks, degraded };
  }

  private async fetch(uri: string, signal?: AbortSignal): Promise<Uint8Array> {
    if (!this.bytes) throw new ValidationError(`Resource ${uri} has no inline content and no byte store is configured`);
    return this.bytes.fetchBytes(uri, { signal });
  }
}
